import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    ConnectionParameters,
    DEFAULT_LOCAL_HOST,
    DEFAULT_LOCAL_PORT,
    ResolveOptions,
    StoredCredentialRecord,
    StoredHostRecord
} from './ServerConfigInterface';
import { ConfigError, describeError } from './errors';
import { decrypt, encrypt } from './Crypto';

export const CONFIG_DIR_NAME = '.socks5-relay';
export const HOST_RECORD_FILE = 'upstream_config';
export const CREDENTIAL_RECORD_FILE = 'upstream_creds.enc';

// RFC 1929 length prefixes are a single byte
const MAX_CREDENTIAL_BYTES = 255;

export const defaultConfigDir = (): string => path.join(os.homedir(), CONFIG_DIR_NAME);

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | undefined =>
    typeof value === 'string' ? value : undefined;

const optionalPort = (value: unknown): number | undefined =>
    typeof value === 'number' && Number.isInteger(value) ? value : undefined;

/**
 * Owns the configuration directory: a plaintext host record and an AES-GCM
 * sealed credential record. The two files are written independently.
 */
export class ConfigManager {
    private configDir: string;

    constructor(configDir: string = defaultConfigDir()) {
        this.configDir = path.resolve(configDir);
    }

    public get hostRecordPath(): string {
        return path.join(this.configDir, HOST_RECORD_FILE);
    }

    public get credentialRecordPath(): string {
        return path.join(this.configDir, CREDENTIAL_RECORD_FILE);
    }

    public configExists(): boolean {
        return fs.existsSync(this.credentialRecordPath);
    }

    /**
     * Merges the stored records with the supplied overrides and persists the
     * result. Non-empty overrides win over stored values.
     */
    public resolve(options: ResolveOptions = {}): ConnectionParameters {
        const passphrase = options.passphrase ?? '';
        let username = '';
        let password = '';
        let upstreamHost = '';
        let upstreamPort = 0;

        if (this.configExists()) {
            if (passphrase === '') {
                throw new ConfigError(
                    'PASSPHRASE_REQUIRED',
                    'stored credentials are encrypted: an encryption passphrase is required to unlock them'
                );
            }
            const stored = this.loadCredentialRecord(passphrase);
            username = stored.username;
            password = stored.password;
            upstreamHost = stored.upstreamHost;
            upstreamPort = stored.upstreamPort;
        }

        const hostRecord = this.loadHostRecord();
        if (hostRecord) {
            if (upstreamHost === '') {
                upstreamHost = hostRecord.upstream_host;
            }
            if (upstreamPort === 0) {
                upstreamPort = hostRecord.upstream_port;
            }
        }

        if (options.upstreamHost) {
            upstreamHost = options.upstreamHost;
        }
        if (options.upstreamPort) {
            upstreamPort = options.upstreamPort;
        }
        if (options.username) {
            username = options.username;
        }
        if (options.password) {
            password = options.password;
        }

        const parameters: ConnectionParameters = {
            username,
            password,
            upstreamHost,
            upstreamPort,
            localHost: options.localHost || DEFAULT_LOCAL_HOST,
            localPort: options.localPort ?? DEFAULT_LOCAL_PORT
        };
        ConfigManager.validate(parameters);

        this.save(parameters, passphrase);
        return parameters;
    }

    /**
     * Writes the host record, and the sealed credential record when a
     * passphrase is given.
     */
    public save(parameters: ConnectionParameters, passphrase: string = ''): void {
        fs.mkdirSync(this.configDir, { recursive: true, mode: 0o700 });

        const hostRecord: StoredHostRecord = {
            upstream_host: parameters.upstreamHost,
            upstream_port: parameters.upstreamPort
        };
        fs.writeFileSync(this.hostRecordPath, JSON.stringify(hostRecord), { encoding: 'utf8', mode: 0o600 });

        if (passphrase !== '') {
            const credentialRecord: StoredCredentialRecord = {
                username: parameters.username,
                password: parameters.password,
                upstreamHost: parameters.upstreamHost,
                upstreamPort: parameters.upstreamPort
            };
            const sealed = encrypt(JSON.stringify(credentialRecord), passphrase);
            fs.writeFileSync(this.credentialRecordPath, sealed, { encoding: 'utf8', mode: 0o600 });
        }
    }

    public static validate(parameters: ConnectionParameters): void {
        if (parameters.upstreamHost === '' || parameters.upstreamPort === 0) {
            throw new ConfigError('MISSING_FIELD', 'upstream host and port are required');
        }
        if (parameters.username === '' || parameters.password === '') {
            throw new ConfigError('MISSING_FIELD', 'upstream username and password are required');
        }
        if (!Number.isInteger(parameters.upstreamPort) || parameters.upstreamPort < 1 || parameters.upstreamPort > 65535) {
            throw new ConfigError('INVALID_FIELD', `upstream port ${parameters.upstreamPort} is out of range (1-65535)`);
        }
        if (!Number.isInteger(parameters.localPort) || parameters.localPort < 0 || parameters.localPort > 65535) {
            throw new ConfigError('INVALID_FIELD', `local port ${parameters.localPort} is out of range (0-65535)`);
        }
        if (Buffer.byteLength(parameters.username, 'utf8') > MAX_CREDENTIAL_BYTES) {
            throw new ConfigError('INVALID_FIELD', `upstream username exceeds ${MAX_CREDENTIAL_BYTES} bytes`);
        }
        if (Buffer.byteLength(parameters.password, 'utf8') > MAX_CREDENTIAL_BYTES) {
            throw new ConfigError('INVALID_FIELD', `upstream password exceeds ${MAX_CREDENTIAL_BYTES} bytes`);
        }
    }

    private loadCredentialRecord(passphrase: string): StoredCredentialRecord {
        const sealed = this.readRecord(this.credentialRecordPath);
        try {
            const parsed: unknown = JSON.parse(decrypt(sealed, passphrase).toString('utf8'));
            if (!isRecord(parsed)) {
                throw new Error('credential record is not an object');
            }
            return {
                username: optionalString(parsed.username) ?? '',
                password: optionalString(parsed.password) ?? '',
                upstreamHost: optionalString(parsed.upstreamHost) ?? '',
                upstreamPort: optionalPort(parsed.upstreamPort) ?? 0
            };
        } catch (error) {
            throw new ConfigError(
                'DECRYPT_FAILED',
                `failed to decrypt stored credentials (wrong passphrase or corrupted file): ${describeError(error)}`,
                { cause: error }
            );
        }
    }

    private readRecord(recordPath: string): string {
        try {
            return fs.readFileSync(recordPath, 'utf8');
        } catch (error) {
            throw new ConfigError('MALFORMED_RECORD', `failed to read ${recordPath}: ${describeError(error)}`, { cause: error });
        }
    }

    private loadHostRecord(): StoredHostRecord | null {
        if (!fs.existsSync(this.hostRecordPath)) {
            return null;
        }
        const raw = this.readRecord(this.hostRecordPath);
        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw new ConfigError('MALFORMED_RECORD', `failed to parse ${this.hostRecordPath}: ${describeError(error)}`, { cause: error });
        }
        if (!isRecord(parsed)) {
            throw new ConfigError('MALFORMED_RECORD', `${this.hostRecordPath} does not hold a host record`);
        }
        return {
            upstream_host: optionalString(parsed.upstream_host) ?? '',
            upstream_port: optionalPort(parsed.upstream_port) ?? 0
        };
    }
}
