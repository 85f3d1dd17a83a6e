import * as net from 'net';
import { once } from 'events';
import { ConnectionParameters } from '../ServerConfigInterface';
import { Logger } from '../Logger';
import { RelayError, describeError } from '../errors';
import {
    AUTH_METHOD_USERPASS,
    Destination,
    REPLY_SUCCEEDED,
    SOCKS_VERSION,
    buildConnectRequest,
    buildUserPassRequest,
    readAddress,
    readBytes,
    readPort,
    writeBytes
} from '../utils';

/**
 * Client side of the second hop: dials the configured upstream proxy,
 * authenticates with username/password and asks it to CONNECT.
 */
export class UpstreamClient {
    constructor(private params: ConnectionParameters, private logger: Logger) {}

    /**
     * Opens and authenticates the upstream connection. The returned socket is
     * owned by the caller; on failure it has already been destroyed.
     */
    public async connect(): Promise<net.Socket> {
        const { upstreamHost, upstreamPort } = this.params;
        this.logger.debug(`Dialing upstream ${upstreamHost}:${upstreamPort}`);

        const socket = net.createConnection({ host: upstreamHost, port: upstreamPort, allowHalfOpen: true });
        try {
            await once(socket, 'connect');
        } catch (error) {
            socket.destroy();
            throw new RelayError('transport', `failed to connect to upstream ${upstreamHost}:${upstreamPort}: ${describeError(error)}`, { cause: error });
        }
        socket.on('error', (err) => {
            this.logger.debug('Error from upstream socket:', err);
        });

        try {
            await this.authenticate(socket);
        } catch (error) {
            socket.destroy();
            throw error;
        }
        this.logger.debug('Authenticated with upstream');
        return socket;
    }

    /**
     * Sends a domain-type CONNECT for `destination` over an authenticated
     * socket and consumes the reply.
     */
    public async requestConnect(socket: net.Socket, destination: Destination): Promise<void> {
        await writeBytes(socket, buildConnectRequest(destination));

        const [version, status, , addressType] = await readBytes(socket, 4);
        if (version !== SOCKS_VERSION) {
            throw new RelayError('protocol', `upstream replied with SOCKS version ${version}`);
        }
        if (status !== REPLY_SUCCEEDED) {
            throw new RelayError('upstream_rejected', `upstream connection failed: ${status}`, { status });
        }
        const boundAddress = await readAddress(socket, addressType);
        const boundPort = await readPort(socket);
        this.logger.debug(`Upstream bound ${boundAddress}:${boundPort}`);
    }

    private async authenticate(socket: net.Socket): Promise<void> {
        await writeBytes(socket, Buffer.from([SOCKS_VERSION, 0x01, AUTH_METHOD_USERPASS]));

        const [version, method] = await readBytes(socket, 2);
        if (version !== SOCKS_VERSION) {
            throw new RelayError('protocol', `upstream replied with SOCKS version ${version}`);
        }
        if (method !== AUTH_METHOD_USERPASS) {
            throw new RelayError('upstream_rejected', `upstream refused username/password authentication (method ${method})`, { status: method });
        }

        await writeBytes(socket, buildUserPassRequest(this.params.username, this.params.password));

        const [, status] = await readBytes(socket, 2);
        if (status !== 0x00) {
            throw new RelayError('upstream_rejected', 'upstream authentication failed', { status });
        }
    }
}
