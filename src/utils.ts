import * as net from 'net';
import ipaddr from 'ipaddr.js';
import { RelayError } from './errors';

export const SOCKS_VERSION = 0x05;
export const USERPASS_AUTH_VERSION = 0x01;

export const AUTH_METHOD_NONE = 0x00;
export const AUTH_METHOD_USERPASS = 0x02;

export const COMMAND_CONNECT = 0x01;

export const ADDRESS_TYPE_IPV4 = 0x01;
export const ADDRESS_TYPE_DOMAIN = 0x03;
export const ADDRESS_TYPE_IPV6 = 0x04;

export const REPLY_SUCCEEDED = 0x00;

// One char per byte, so hostnames are forwarded exactly as received
export const DOMAIN_ENCODING: BufferEncoding = 'latin1';

export interface Destination {
    host: string;
    port: number;
}

/**
 * Resolves with exactly `count` bytes from `socket`, pausing it afterwards
 * and pushing any surplus back onto its read buffer. Rejects with a
 * transport {@link RelayError} if the stream ends or errors first.
 */
export const readBytes = (socket: net.Socket, count: number): Promise<Buffer> => {
    if (count === 0) {
        return Promise.resolve(Buffer.alloc(0));
    }
    if (socket.destroyed || socket.readableEnded) {
        return Promise.reject(new RelayError('transport', `connection closed before ${count} bytes could be read`));
    }

    return new Promise((resolve, reject) => {
        let received = Buffer.alloc(0);

        const cleanup = () => {
            socket.removeListener('data', onData);
            socket.removeListener('end', onEnd);
            socket.removeListener('close', onEnd);
            socket.removeListener('error', onError);
        };

        const onData = (chunk: Buffer) => {
            received = Buffer.concat([received, chunk]);
            if (received.length < count) {
                return;
            }
            cleanup();
            socket.pause();
            if (received.length > count) {
                socket.unshift(received.subarray(count));
            }
            resolve(received.subarray(0, count));
        };

        const onEnd = () => {
            cleanup();
            reject(new RelayError('transport', `connection closed after ${received.length} of ${count} bytes`));
        };

        const onError = (error: Error) => {
            cleanup();
            reject(new RelayError('transport', `read failed: ${error.message}`, { cause: error }));
        };

        socket.on('data', onData);
        socket.once('end', onEnd);
        socket.once('close', onEnd);
        socket.once('error', onError);
        socket.resume();
    });
};

export const writeBytes = (socket: net.Socket, data: Buffer): Promise<void> =>
    new Promise((resolve, reject) => {
        socket.write(data, (error) => {
            if (error) {
                reject(new RelayError('transport', `write failed: ${error.message}`, { cause: error }));
            } else {
                resolve();
            }
        });
    });

/**
 * Reads the variable-length address that follows an address type byte in a
 * request or reply.
 */
export const readAddress = async (socket: net.Socket, addressType: number): Promise<string> => {
    switch (addressType) {
        case ADDRESS_TYPE_IPV4:
            return ipaddr.fromByteArray(Array.from(await readBytes(socket, 4))).toString();
        case ADDRESS_TYPE_DOMAIN: {
            const [length] = await readBytes(socket, 1);
            return (await readBytes(socket, length)).toString(DOMAIN_ENCODING);
        }
        case ADDRESS_TYPE_IPV6: {
            const address = ipaddr.fromByteArray(Array.from(await readBytes(socket, 16)));
            if (address instanceof ipaddr.IPv6 && address.isIPv4MappedAddress()) {
                return address.toIPv4Address().toString();
            }
            return address.toString();
        }
        default:
            throw new RelayError('protocol', `unsupported address type: 0x${addressType.toString(16).padStart(2, '0')}`);
    }
};

export const readPort = async (socket: net.Socket): Promise<number> =>
    (await readBytes(socket, 2)).readUInt16BE(0);

// IPv6 hosts are bracketed so the port separator stays unambiguous
export const formatTarget = ({ host, port }: Destination): string =>
    net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;

export const splitTarget = (target: string): Destination => {
    const separator = target.lastIndexOf(':');
    if (separator <= 0) {
        throw new RelayError('protocol', `missing port in target "${target}"`);
    }
    let host = target.slice(0, separator);
    const portText = target.slice(separator + 1);
    if (host.startsWith('[') && host.endsWith(']')) {
        host = host.slice(1, -1);
    } else if (host.includes(':')) {
        throw new RelayError('protocol', `too many colons in target "${target}"`);
    }
    const port = Number(portText);
    if (!/^\d+$/.test(portText) || port > 65535) {
        throw new RelayError('protocol', `invalid port in target "${target}"`);
    }
    return { host, port };
};

// The bound address is always reported as 0.0.0.0:0
export const buildSuccessReply = (): Buffer =>
    Buffer.from([SOCKS_VERSION, REPLY_SUCCEEDED, 0x00, ADDRESS_TYPE_IPV4, 0, 0, 0, 0, 0, 0]);

export const buildUserPassRequest = (username: string, password: string): Buffer => {
    const usernameBuffer = Buffer.from(username, 'utf8');
    const passwordBuffer = Buffer.from(password, 'utf8');
    if (usernameBuffer.length > 255 || passwordBuffer.length > 255) {
        throw new RelayError('protocol', 'upstream username and password must each fit in 255 bytes');
    }
    return Buffer.concat([
        Buffer.from([USERPASS_AUTH_VERSION, usernameBuffer.length]),
        usernameBuffer,
        Buffer.from([passwordBuffer.length]),
        passwordBuffer
    ]);
};

export const buildConnectRequest = ({ host, port }: Destination): Buffer => {
    const hostBuffer = Buffer.from(host, DOMAIN_ENCODING);
    if (hostBuffer.length === 0 || hostBuffer.length > 255) {
        throw new RelayError('protocol', `target host "${host}" cannot be encoded as a domain name`);
    }
    const request = Buffer.alloc(7 + hostBuffer.length);
    request[0] = SOCKS_VERSION;
    request[1] = COMMAND_CONNECT;
    request[2] = 0x00;
    request[3] = ADDRESS_TYPE_DOMAIN;
    request[4] = hostBuffer.length;
    hostBuffer.copy(request, 5);
    request.writeUInt16BE(port, 5 + hostBuffer.length);
    return request;
};
