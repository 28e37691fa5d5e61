#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point.
 * @module cli
 * @version 1.0.0
 */

import 'dotenv/config';
import { AppOrchestrator } from './Orchestrator';
import { ConfigError, loadConfig, type AppConfig } from './config/AppConfig';
import { CliUsageError, USAGE, parseArgs, type CliOptions } from './config/cliArgs';
import { EXIT_CODES, type ExitCode } from './core/error-recovery';
import { createConsoleLogger } from './utils/logger';

export interface BootstrapIO {
    write: (text: string) => void;
    writeError: (text: string) => void;
    env?: NodeJS.ProcessEnv;
}

const PROCESS_IO: BootstrapIO = {
    write: (text) => {
        process.stdout.write(text);
    },
    writeError: (text) => {
        process.stderr.write(text);
    },
};

// ============================================
// Application Bootstrap
// ============================================

let orchestrator: AppOrchestrator | null = null;

/**
 * Parse the command line, resolve configuration and run one session.
 * @returns Process exit code
 */
async function bootstrap(argv: readonly string[], io: BootstrapIO = PROCESS_IO): Promise<ExitCode> {
    let options: CliOptions;
    try {
        options = parseArgs(argv);
    } catch (error) {
        if (error instanceof CliUsageError) {
            io.writeError(`Error: ${error.message}\n\n${USAGE}`);
            return EXIT_CODES.FAILURE;
        }
        throw error;
    }

    if (options.help) {
        io.write(USAGE);
        return EXIT_CODES.OK;
    }

    let config: AppConfig;
    try {
        config = loadConfig({
            overrides: options.overrides,
            ...(io.env ? { env: io.env } : {}),
            logger: createConsoleLogger(options.overrides.debug ?? false),
        });
    } catch (error) {
        if (error instanceof ConfigError) {
            io.writeError(`Error: ${error.message}\n`);
            return EXIT_CODES.FAILURE;
        }
        throw error;
    }

    orchestrator = new AppOrchestrator(config, { write: io.write, writeError: io.writeError });
    return orchestrator.run(options.request);
}

/**
 * Abandon the running session: stop players, release the terminal, and keep a
 * session that has not reached playback from starting it.
 */
function cleanup(): void {
    orchestrator?.interrupt();
}

if (require.main === module) {
    process.on('SIGINT', cleanup);
    process.on('SIGTERM', cleanup);
    process.on('unhandledRejection', (reason) => {
        console.error('Unhandled promise rejection:', reason);
        cleanup();
        process.exit(EXIT_CODES.FAILURE);
    });

    bootstrap(process.argv.slice(2))
        .then((code) => {
            process.exit(code);
        })
        .catch((error: unknown) => {
            console.error('Failed to start atc-tuner:', error);
            cleanup();
            process.exit(EXIT_CODES.FAILURE);
        });
}

// Export for testing
export { bootstrap, cleanup };
