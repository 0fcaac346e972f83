/**
 * Command dispatch for the tessera CLI.
 * Config is loaded only by the commands that need it, so usage prints without one.
 */

import { resolve } from 'path';
import { describeConfig, getConfig } from './config/config.js';
import { PathFactory } from './core/PathFactory.js';
import type { TesseraConfig } from './core/types.js';
import { createDataStorage, S3DataStorage } from './adapters/storage/index.js';

export const USAGE = 'Commands: \n  config, \n  path [datasetName] [--local], \n  exists <s3://bucket/key>, \n  put <localFile> <s3://bucket/key>, \n  fetch <address> <destinationDir> [--skip-existing]';

export type ConfigLoader = () => Promise<TesseraConfig>;

export async function runCommand(argv: string[], loadConfig: ConfigLoader = getConfig): Promise<void> {
    const [command, arg1, arg2] = argv;

    switch (command) {
        case 'config':
            console.log(describeConfig(await loadConfig()));
            break;

        case 'path': {
            const factory = PathFactory.fromConfig(await loadConfig());
            const datasetName = arg1 && !arg1.startsWith('--') ? arg1 : undefined;
            const local = argv.includes('--local');
            console.log(factory.getColumnConcatenatedBytesFilesPath({ datasetName, s3Prefix: !local }));
            break;
        }

        case 'exists': {
            if (!arg1) throw new Error('Usage: exists <s3://bucket/key>');
            const storage = S3DataStorage.fromConfig(await loadConfig());
            const found = await storage.checkExists(arg1);
            console.log(found ? `✅ ${arg1} exists` : `❌ ${arg1} not found`);
            if (!found) process.exitCode = 1;
            break;
        }

        case 'put': {
            if (!arg1 || !arg2) throw new Error('Usage: put <localFile> <s3://bucket/key>');
            const storage = S3DataStorage.fromConfig(await loadConfig());
            await storage.putFile(resolve(arg1), arg2);
            console.log(`✅ Uploaded ${arg1} -> ${arg2}`);
            break;
        }

        case 'fetch': {
            if (!arg1 || !arg2) throw new Error('Usage: fetch <address> <destinationDir> [--skip-existing]');
            const storage = createDataStorage(await loadConfig());
            const localPath = await storage.fetchFile(arg1, resolve(arg2), {
                skipIfPresent: argv.includes('--skip-existing'),
            });
            console.log(`✅ Fetched ${arg1} -> ${localPath}`);
            break;
        }

        default:
            console.log(USAGE);
    }
}
