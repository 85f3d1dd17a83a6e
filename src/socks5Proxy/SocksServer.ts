import * as net from 'net';
import { SocksSession } from './SocksSession';
import { Logger } from '../Logger';
import { ConnectionParameters } from '../ServerConfigInterface';

export enum ServerState {
    Created = 'created',
    Starting = 'starting',
    Listening = 'listening',
    ShuttingDown = 'shutting_down',
    Stopped = 'stopped'
}

export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

export interface SocksServerOptions {
    shutdownGracePeriodMs?: number;
}

export class SocksServer {
    private server: net.Server;
    private state: ServerState = ServerState.Created;
    private activeSessions: Set<Promise<void>>;
    private logger: Logger;
    private params: ConnectionParameters;
    private shutdownGracePeriodMs: number;
    private binding: Promise<void> | null = null;
    private stopping: Promise<void> | null = null;
    private nextSessionId = 1;

    constructor(params: ConnectionParameters, logger: Logger, options: SocksServerOptions = {}) {
        this.params = params;
        this.logger = logger;
        this.shutdownGracePeriodMs = options.shutdownGracePeriodMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
        this.activeSessions = new Set();
        this.server = new net.Server({ allowHalfOpen: true });

        this.server.on('connection', this.handleConnection.bind(this));
    }

    public getState(): ServerState {
        return this.state;
    }

    public get activeSessionCount(): number {
        return this.activeSessions.size;
    }

    public address(): net.AddressInfo | null {
        const address = this.server.address();
        return address !== null && typeof address === 'object' ? address : null;
    }

    private handleConnection(socket: net.Socket) {
        if (this.state !== ServerState.Listening) {
            this.logger.debug(`Rejecting connection from ${socket.remoteAddress}:${socket.remotePort} while ${this.state}`);
            socket.destroy();
            return;
        }
        this.logger.info(`New connection on server from socket : ${socket.remoteAddress}:${socket.remotePort}`);

        const session = new SocksSession(this.nextSessionId++, socket, this.params, this.logger);
        const task: Promise<void> = session.run().finally(() => {
            this.activeSessions.delete(task);
        });
        this.activeSessions.add(task);
    }

    /**
     * Binds the listener. Resolves once listening; rejects if the bind fails.
     * Calling it again, or after {@link stop}, does nothing. A {@link stop}
     * issued while the bind is pending closes the listener once it is bound.
     */
    public async start(host: string = this.params.localHost, port: number = this.params.localPort): Promise<void> {
        if (this.state !== ServerState.Created) {
            this.logger.warn(`Ignoring start request: server is ${this.state}`);
            return;
        }

        this.state = ServerState.Starting;
        this.binding = this.listen(host, port);
        try {
            await this.binding;
        } catch (error) {
            if (this.getState() === ServerState.Starting) {
                this.state = ServerState.Created;
            }
            throw error;
        }
        if (this.getState() !== ServerState.Starting) {
            // stop() arrived during the bind and closes the listener itself
            return;
        }

        // Once bound, errors concern individual accepts and never stop the server
        this.server.on('error', (err) => {
            this.logger.error(`Server error: ${err.message}`);
        });
        this.state = ServerState.Listening;

        const bound = this.address();
        this.logger.info(`SOCKS5 relay listening on ${bound ? `${bound.address}:${bound.port}` : `${host}:${port}`}, upstream ${this.params.upstreamHost}:${this.params.upstreamPort}`);
    }

    private listen(host: string, port: number): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const onListenError = (error: Error) => {
                this.logger.error(`Error starting SOCKS5 server: ${error.message}`);
                reject(error);
            };
            this.server.once('error', onListenError);
            this.server.listen(port, host, () => {
                this.server.removeListener('error', onListenError);
                resolve();
            });
        });
    }

    /**
     * Stops accepting connections and waits for in-flight sessions, at most
     * for the grace period. Sessions still running afterwards are left alone.
     */
    public stop(): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.shutdown();
        }
        return this.stopping;
    }

    private async shutdown(): Promise<void> {
        const previousState = this.state;
        this.state = ServerState.ShuttingDown;

        if (previousState === ServerState.Starting && this.binding) {
            // A failed bind is reported to the caller of start()
            const bound = await this.binding.then(() => true, () => false);
            if (bound) {
                this.closeListener();
            }
        } else if (previousState === ServerState.Listening) {
            this.closeListener();
            this.logger.info(`Closing the server, waiting for ${this.activeSessions.size} active session(s)`);

            const drained = await this.waitForSessions();
            if (!drained) {
                this.logger.warn(`Shutdown grace period of ${this.shutdownGracePeriodMs} ms elapsed with ${this.activeSessions.size} session(s) still active`);
            }
        }

        this.state = ServerState.Stopped;
        this.logger.info('SOCKS5 relay stopped');
    }

    private closeListener() {
        this.server.close((error) => {
            if (error) {
                this.logger.debug(`Listener close reported: ${error.message}`);
            } else {
                this.logger.debug('Listener closed and all connections ended');
            }
        });
    }

    private async waitForSessions(): Promise<boolean> {
        if (this.activeSessions.size === 0) {
            return true;
        }
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<boolean>((resolve) => {
            timer = setTimeout(() => resolve(false), this.shutdownGracePeriodMs);
            timer.unref();
        });
        const allDone = Promise.all(this.activeSessions).then(() => true);
        try {
            return await Promise.race([allDone, timeout]);
        } finally {
            clearTimeout(timer);
        }
    }
}
