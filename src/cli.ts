import { loadConfig } from './config';
import { Create3Error } from './errors';
import { deriveAddress, findVanitySalt, findVanitySaltBatch } from './index';
import { makeLogger } from './logger';
import { ConsoleReporter } from './report';

export const USAGE = `Usage:
  create3-vanity address <deployer> <salt>
  create3-vanity salt <deployer> <prefix>
  create3-vanity salt-prefix <deployer> <saltPrefix> <prefix>
  create3-vanity batch <deployer> <prefix> <count>

<deployer> is 40 hex characters (0x optional); <prefix> is hex without 0x.
A <salt> of 64 hex characters is used as-is, anything else is hashed.

Environment:
  CREATE3_WORKERS, CREATE3_POOL (cluster|inline), CREATE3_BATCH_SIZE,
  CREATE3_PROGRESS_INTERVAL_MS, CREATE3_MAX_ATTEMPTS, LOG_LEVEL`;

export interface CliIo {
    out: (line: string) => void;
    err: (line: string) => void;
    signal?: AbortSignal;
}

const ARITY: Record<string, number> = {
    address: 2,
    salt: 2,
    'salt-prefix': 3,
    batch: 3,
};

export async function runCli(argv: string[], io: CliIo): Promise<number> {
    const [command, ...args] = argv;
    if (command === undefined || ARITY[command] === undefined || args.length !== ARITY[command]) {
        io.err(USAGE);
        return 1;
    }

    const config = loadConfig();
    const logger = makeLogger({ module: 'cli', command }, config.logLevel, 'stderr');
    const reporter = new ConsoleReporter(io.out);

    try {
        switch (command) {
            case 'address': {
                const [deployer, salt] = args;
                io.out(`create3 address: ${deriveAddress(deployer, salt)}`);
                break;
            }
            case 'salt': {
                const [deployer, prefix] = args;
                const result = await findVanitySalt(deployer, prefix, undefined, { logger, signal: io.signal });
                reporter.report(result, { prefix });
                break;
            }
            case 'salt-prefix': {
                const [deployer, saltPrefix, prefix] = args;
                const result = await findVanitySalt(deployer, prefix, saltPrefix, { logger, signal: io.signal });
                reporter.report(result, { prefix, saltPrefix });
                break;
            }
            case 'batch': {
                const [deployer, prefix, countArg] = args;
                await findVanitySaltBatch(deployer, prefix, Number(countArg), {
                    logger,
                    signal: io.signal,
                    onResult: (result, index) => reporter.report(result, { prefix, index: index + 1 }),
                });
                break;
            }
        }
        return 0;
    } catch (error) {
        if (error instanceof Create3Error) {
            io.err(error.message);
            return 1;
        }
        throw error;
    }
}
