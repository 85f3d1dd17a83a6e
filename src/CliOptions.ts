import * as path from 'path';
import { LogLevel, LogOutput, parseLogLevel, parseLogOutput } from './Logger';
import { DEFAULT_LOCAL_HOST, DEFAULT_LOCAL_PORT } from './ServerConfigInterface';
import { defaultConfigDir } from './ConfigManager';

export interface CliOptions {
    showVersion: boolean;
    configure: boolean;
    username: string;
    password: string;
    passphrase: string;
    upstreamHost: string;
    upstreamPort: number;
    localHost: string;
    localPort: number;
    configDir: string;
    logLevel: LogLevel;
    logOutput: LogOutput;
    logFilePath: string;
}

export type Environment = Record<string, string | undefined>;

const argValue = (argv: string[], flag: string): string | null => {
    const index = argv.indexOf(flag);
    return index > -1 && index + 1 < argv.length ? argv[index + 1] : null;
};

const portArg = (argv: string[], flag: string, fallback: number): number => {
    const value = argValue(argv, flag);
    if (value === null) {
        return fallback;
    }
    const port = Number(value);
    if (!/^\d+$/.test(value) || port > 65535) {
        throw new Error(`${flag} expects a port number between 0 and 65535, got "${value}"`);
    }
    return port;
};

/**
 * Reads flags from `argv`, falling back to environment variables for the
 * credentials and config directory. An upstream port of 0 means "not given".
 */
export const parseCliOptions = (argv: string[], env: Environment = {}): CliOptions => ({
    showVersion: argv.includes('--version'),
    configure: argv.includes('--configure'),
    username: argValue(argv, '--username') ?? env.UPSTREAM_USERNAME ?? '',
    password: argValue(argv, '--password') ?? env.UPSTREAM_PASSWORD ?? '',
    passphrase: argValue(argv, '--encpass') ?? env.SOCKS5RELAY_PASSPHRASE ?? '',
    upstreamHost: argValue(argv, '--upstream_host') ?? '',
    upstreamPort: portArg(argv, '--upstream_port', 0),
    localHost: argValue(argv, '--local_host') ?? DEFAULT_LOCAL_HOST,
    localPort: portArg(argv, '--local_port', DEFAULT_LOCAL_PORT),
    configDir: argValue(argv, '--config_dir') ?? env.SOCKS5RELAY_CONFIG_DIR ?? defaultConfigDir(),
    logLevel: parseLogLevel(argValue(argv, '--log_level')),
    logOutput: parseLogOutput(argValue(argv, '--log_output')),
    logFilePath: argValue(argv, '--log_file_path') ?? path.join(process.cwd(), 'socks5-relay.log')
});
