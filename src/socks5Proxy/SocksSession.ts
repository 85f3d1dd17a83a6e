import * as net from 'net';
import { finished } from 'stream/promises';
import { ConnectionParameters } from '../ServerConfigInterface';
import { Logger } from '../Logger';
import { RelayError, describeError } from '../errors';
import { UpstreamClient } from './UpstreamClient';
import {
    AUTH_METHOD_NONE,
    Destination,
    SOCKS_VERSION,
    buildSuccessReply,
    formatTarget,
    readAddress,
    readBytes,
    readPort,
    splitTarget,
    writeBytes
} from '../utils';

export interface ConnectRequest extends Destination {
    command: number;
    addressType: number;
    target: string;
}

/**
 * Phase 1: reads the greeting and always selects "no authentication".
 * The offered methods are read but not inspected.
 */
export const negotiateInbound = async (socket: net.Socket): Promise<void> => {
    const [version, methodCount] = await readBytes(socket, 2);
    if (version !== SOCKS_VERSION) {
        throw new RelayError('protocol', `version mismatch: unsupported SOCKS version ${version}`);
    }
    await readBytes(socket, methodCount);
    await writeBytes(socket, Buffer.from([SOCKS_VERSION, AUTH_METHOD_NONE]));
};

/**
 * Phase 2: reads the request and acknowledges it with a zeroed success reply.
 * Every command is served as CONNECT.
 */
export const readConnectRequest = async (socket: net.Socket): Promise<ConnectRequest> => {
    const [version, command, , addressType] = await readBytes(socket, 4);
    if (version !== SOCKS_VERSION) {
        throw new RelayError('protocol', `version mismatch: unsupported SOCKS version ${version}`);
    }
    const host = await readAddress(socket, addressType);
    const port = await readPort(socket);
    await writeBytes(socket, buildSuccessReply());
    return { command, addressType, host, port, target: formatTarget({ host, port }) };
};

export class SocksSession {
    private upstreamSocket: net.Socket | null = null;
    private target: string | null = null;
    private logger: Logger;
    private upstream: UpstreamClient;

    constructor(readonly id: number, private clientSocket: net.Socket, params: ConnectionParameters, logger: Logger) {
        this.logger = logger.withScope(`session ${id}`);
        this.upstream = new UpstreamClient(params, this.logger);

        this.clientSocket.on('error', (err) => {
            this.logger.debug('Error from client socket:', err);
        });
    }

    /**
     * Runs the relay for one client from greeting to teardown. Never rejects:
     * failures are logged and both sockets are closed.
     */
    public async run(): Promise<void> {
        this.logger.info(`Initialize new session from ${this.clientSocket.remoteAddress}:${this.clientSocket.remotePort}`);
        try {
            await negotiateInbound(this.clientSocket);

            const request = await readConnectRequest(this.clientSocket);
            this.target = request.target;
            this.logger.info(`CONNECT ${this.target} requested`);

            this.upstreamSocket = await this.upstream.connect();
            await this.upstream.requestConnect(this.upstreamSocket, splitTarget(this.target));
            this.logger.info(`Upstream tunnel to ${this.target} established`);

            await this.splice(this.clientSocket, this.upstreamSocket);
        } catch (error) {
            const kind = error instanceof RelayError ? error.kind : 'unexpected';
            this.logger.error(`Session failed (${kind}): ${describeError(error)}`);
        } finally {
            this.cleanup();
        }
    }

    // Phase 5: two independent copy loops, each ending only its destination's write side
    private async splice(client: net.Socket, upstream: net.Socket): Promise<void> {
        await Promise.all([
            this.pump(client, upstream, 'client -> upstream'),
            this.pump(upstream, client, 'upstream -> client')
        ]);
    }

    private async pump(source: net.Socket, destination: net.Socket, direction: string): Promise<void> {
        source.pipe(destination);
        try {
            await finished(source, { writable: false });
            // pipe() has ended the destination; let its write side flush
            await finished(destination, { readable: false });
            this.logger.debug(`Relay ${direction} reached end of stream`);
        } catch (error) {
            // A broken stream ends the tunnel in both directions
            this.logger.debug(`Relay ${direction} stopped: ${describeError(error)}`);
            source.unpipe(destination);
            source.destroy();
            destination.destroy();
        }
    }

    private cleanup() {
        this.logger.info(`Cleaned up session${this.target ? ` for ${this.target}` : ''}`);
        if (this.upstreamSocket && !this.upstreamSocket.destroyed) {
            this.upstreamSocket.destroy();
        }
        this.upstreamSocket = null;
        if (!this.clientSocket.destroyed) {
            this.clientSocket.destroy();
        }
    }
}
