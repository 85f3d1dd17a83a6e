export interface Credential {
    username: string;
    password: string;
};

// Resolved once at startup and shared read-only by every session
export interface ConnectionParameters extends Credential {
    upstreamHost: string;
    upstreamPort: number;
    localHost: string;
    localPort: number;
};

// Plaintext record in `upstream_config`
export interface StoredHostRecord {
    upstream_host: string;
    upstream_port: number;
};

// Sealed record in `upstream_creds.enc`
export interface StoredCredentialRecord extends Credential {
    upstreamHost: string;
    upstreamPort: number;
};

export interface ResolveOptions {
    username?: string;
    password?: string;
    passphrase?: string;
    upstreamHost?: string;
    upstreamPort?: number;
    localHost?: string;
    localPort?: number;
};

export const DEFAULT_LOCAL_HOST = '127.0.0.1';
export const DEFAULT_LOCAL_PORT = 1080;
