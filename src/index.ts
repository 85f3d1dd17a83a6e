#!/usr/bin/env node

import dotenv from 'dotenv';
import { SocksServer } from './socks5Proxy/SocksServer';
import { ConfigManager } from './ConfigManager';
import { ConfigError } from './errors';
import { Logger } from './Logger';
import { parseCliOptions } from './CliOptions';
import { ConnectionParameters, ResolveOptions } from './ServerConfigInterface';
import { promptCredentials, promptSecret } from './Prompt';
import { version } from '../package.json';

async function main() {
    try {
        dotenv.config();
        const options = parseCliOptions(process.argv, process.env);

        if (options.showVersion) {
            console.log(`socks5-relay version ${version}`);
            return;
        }

        const logger = new Logger(options.logLevel, options.logOutput, options.logFilePath);
        const configManager = new ConfigManager(options.configDir);

        const resolveOptions: ResolveOptions = {
            username: options.username,
            password: options.password,
            passphrase: options.passphrase,
            upstreamHost: options.upstreamHost,
            upstreamPort: options.upstreamPort,
            localHost: options.localHost,
            localPort: options.localPort
        };

        if (options.configure) {
            if (configManager.configExists()) {
                console.log(`Existing credentials in ${options.configDir} will be replaced`);
            }
            Object.assign(resolveOptions, await promptCredentials());
        }

        let params: ConnectionParameters;
        try {
            params = configManager.resolve(resolveOptions);
        } catch (error) {
            if (!(error instanceof ConfigError) || error.code !== 'PASSPHRASE_REQUIRED') {
                throw error;
            }
            const passphrase = await promptSecret('Enter encryption passphrase to decrypt credentials: ');
            params = configManager.resolve({ ...resolveOptions, passphrase });
        }

        logger.debug(`Server Process PID : ${process.pid.toString()}`);

        const socksServer = new SocksServer(params, logger);
        await socksServer.start();

        // Handle graceful shutdown
        const gracefulShutdown = async (signal: NodeJS.Signals) => {
            logger.info(`Received ${signal}, shutting down the server...`);
            await socksServer.stop();
            logger.info('Server shutdown complete');
            process.exit(0);
        };

        const onSignal = (signal: NodeJS.Signals) => {
            gracefulShutdown(signal).catch((error) => {
                console.error('Failed to shut down cleanly:', error);
                process.exit(1);
            });
        };
        process.once('SIGINT', onSignal);
        process.once('SIGTERM', onSignal);

    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`Configuration error (${error.code}): ${error.message}`);
        } else {
            console.error('Failed to start the server:', error);
        }
        process.exit(1);
    }
}

void main();
