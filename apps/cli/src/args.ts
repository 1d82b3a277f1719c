/**
 * Command line arguments
 */

import { ConfigError } from './config.js';

export interface CliArgs {
    command: 'run' | 'demo';
    detailed: boolean;
    articlesFile?: string;
}

export function parseArgs(argv: string[]): CliArgs {
    const [command = 'run', ...rest] = argv;
    if (command !== 'run' && command !== 'demo') {
        throw new ConfigError(`Unknown command "${command}" (expected "run" or "demo")`);
    }

    const args: CliArgs = { command, detailed: false };
    for (let i = 0; i < rest.length; i++) {
        const flag = rest[i];
        if (flag === '--detailed') {
            args.detailed = true;
        } else if (flag === '--articles') {
            const value = rest[++i];
            if (!value) throw new ConfigError('--articles needs a file path');
            args.articlesFile = value;
        } else {
            throw new ConfigError(`Unknown option "${flag}"`);
        }
    }
    return args;
}
