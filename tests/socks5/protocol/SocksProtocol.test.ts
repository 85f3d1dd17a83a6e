import * as net from 'net';
import { negotiateInbound, readConnectRequest } from '../../../src/socks5Proxy/SocksSession';
import { RelayError } from '../../../src/errors';
import {
    buildConnectRequest,
    buildSuccessReply,
    buildUserPassRequest,
    formatTarget,
    readBytes,
    splitTarget
} from '../../../src/utils';
import { collectUntilClose, createSocketPair } from '../../socketHelpers';

describe('SOCKS5 inbound handshake', () => {
    let client: net.Socket;
    let server: net.Socket;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
        ({ client, server, cleanup } = await createSocketPair());
    });

    afterEach(async () => {
        await cleanup();
    });

    test('Should select no-auth whatever methods are offered', async () => {
        const negotiation = negotiateInbound(server);
        client.write(Buffer.from([0x05, 0x03, 0x00, 0x02, 0x80]));

        await negotiation;
        const reply = await readBytes(client, 2);
        expect(reply).toEqual(Buffer.from([0x05, 0x00]));
    });

    test('Should select no-auth when only username/password is offered', async () => {
        const negotiation = negotiateInbound(server);
        client.write(Buffer.from([0x05, 0x01, 0x02]));

        await negotiation;
        expect(await readBytes(client, 2)).toEqual(Buffer.from([0x05, 0x00]));
    });

    test('Should accept an empty method list', async () => {
        const negotiation = negotiateInbound(server);
        client.write(Buffer.from([0x05, 0x00]));

        await negotiation;
        expect(await readBytes(client, 2)).toEqual(Buffer.from([0x05, 0x00]));
    });

    test('Should fail with a version mismatch and write nothing', async () => {
        const received = collectUntilClose(client);
        const negotiation = negotiateInbound(server);
        client.write(Buffer.from([0x04, 0x01, 0x00]));

        await expect(negotiation).rejects.toThrow(/version mismatch/);
        await expect(negotiation).rejects.toMatchObject({ kind: 'protocol' });
        server.destroy();
        expect((await received).length).toBe(0);
    });

    test('Should fail on a short read', async () => {
        const negotiation = negotiateInbound(server);
        client.end(Buffer.from([0x05, 0x02, 0x00]));

        await expect(negotiation).rejects.toBeInstanceOf(RelayError);
        await expect(negotiation).rejects.toMatchObject({ kind: 'transport' });
    });
});

describe('SOCKS5 inbound request', () => {
    let client: net.Socket;
    let server: net.Socket;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
        ({ client, server, cleanup } = await createSocketPair());
    });

    afterEach(async () => {
        await cleanup();
    });

    test('Should parse an IPv4 target and send the zeroed success reply', async () => {
        const parsing = readConnectRequest(server);
        client.write(Buffer.from([0x05, 0x01, 0x00, 0x01, 192, 168, 1, 1, 0x00, 0x50]));

        const request = await parsing;
        expect(request.target).toBe('192.168.1.1:80');
        expect(request.host).toBe('192.168.1.1');
        expect(request.port).toBe(80);
        expect(await readBytes(client, 10)).toEqual(Buffer.from([5, 0, 0, 1, 0, 0, 0, 0, 0, 0]));
    });

    test('Should parse a domain target', async () => {
        const parsing = readConnectRequest(server);
        client.write(Buffer.concat([
            Buffer.from([0x05, 0x01, 0x00, 0x03, 11]),
            Buffer.from('example.com'),
            Buffer.from([0x01, 0xbb])
        ]));

        const request = await parsing;
        expect(request.target).toBe('example.com:443');
        expect(request.addressType).toBe(0x03);
    });

    test('Should format an IPv6 target in compressed form', async () => {
        const parsing = readConnectRequest(server);
        client.write(Buffer.concat([
            Buffer.from([0x05, 0x01, 0x00, 0x04]),
            Buffer.from('20010db8000000000000000000000001', 'hex'),
            Buffer.from([0x1f, 0x90])
        ]));

        const request = await parsing;
        expect(request.host).toBe('2001:db8::1');
        expect(request.port).toBe(8080);
        expect(request.target).toBe('[2001:db8::1]:8080');
    });

    test('Should print an IPv4-mapped IPv6 target in dotted form', async () => {
        const parsing = readConnectRequest(server);
        client.write(Buffer.concat([
            Buffer.from([0x05, 0x01, 0x00, 0x04]),
            Buffer.from('00000000000000000000ffff0a000007', 'hex'),
            Buffer.from([0x00, 0x16])
        ]));

        const request = await parsing;
        expect(request.host).toBe('10.0.0.7');
        expect(request.target).toBe('10.0.0.7:22');
    });

    test('Should keep every byte of a non-ASCII domain', async () => {
        const parsing = readConnectRequest(server);
        client.write(Buffer.from([0x05, 0x01, 0x00, 0x03, 2, 0xc3, 0x28, 0x00, 0x50]));

        const request = await parsing;
        expect(Buffer.from(request.host, 'latin1')).toEqual(Buffer.from([0xc3, 0x28]));
        expect(request.port).toBe(80);
    });

    test('Should serve any command byte as CONNECT', async () => {
        const parsing = readConnectRequest(server);
        client.write(Buffer.from([0x05, 0x02, 0x00, 0x01, 10, 0, 0, 7, 0x00, 0x16]));

        const request = await parsing;
        expect(request.command).toBe(0x02);
        expect(request.target).toBe('10.0.0.7:22');
    });

    test('Should reassemble a request split across writes', async () => {
        const parsing = readConnectRequest(server);
        client.write(Buffer.from([0x05, 0x01]));
        client.write(Buffer.from([0x00, 0x03, 4, 0x68]));
        client.write(Buffer.from([0x6f, 0x73, 0x74, 0x00]));
        client.write(Buffer.from([0x19]));

        expect((await parsing).target).toBe('host:25');
    });

    test('Should reject an unsupported address type without replying', async () => {
        const received = collectUntilClose(client);
        const parsing = readConnectRequest(server);
        client.write(Buffer.from([0x05, 0x01, 0x00, 0x05, 1, 2, 3, 4, 0x00, 0x50]));

        await expect(parsing).rejects.toThrow('unsupported address type: 0x05');
        server.destroy();
        expect((await received).length).toBe(0);
    });

    test('Should reject a request with the wrong version', async () => {
        const received = collectUntilClose(client);
        const parsing = readConnectRequest(server);
        client.write(Buffer.from([0x04, 0x01, 0x00, 0x01, 1, 2, 3, 4, 0x00, 0x50]));

        await expect(parsing).rejects.toThrow(/version mismatch/);
        server.destroy();
        expect((await received).length).toBe(0);
    });
});

describe('SOCKS5 wire helpers', () => {
    test('formatTarget brackets IPv6 hosts only', () => {
        expect(formatTarget({ host: 'example.com', port: 443 })).toBe('example.com:443');
        expect(formatTarget({ host: '::1', port: 1080 })).toBe('[::1]:1080');
    });

    test('splitTarget reverses formatTarget', () => {
        expect(splitTarget('example.com:443')).toEqual({ host: 'example.com', port: 443 });
        expect(splitTarget('192.168.1.1:80')).toEqual({ host: '192.168.1.1', port: 80 });
        expect(splitTarget('[2001:db8::1]:8080')).toEqual({ host: '2001:db8::1', port: 8080 });
    });

    test('splitTarget rejects ambiguous or portless targets', () => {
        expect(() => splitTarget('2001:db8::1:80')).toThrow(/too many colons/);
        expect(() => splitTarget('example.com')).toThrow(/missing port/);
        expect(() => splitTarget('example.com:http')).toThrow(/invalid port/);
    });

    test('buildConnectRequest always uses the domain address type', () => {
        expect(buildConnectRequest({ host: 'example.com', port: 443 })).toEqual(Buffer.concat([
            Buffer.from([0x05, 0x01, 0x00, 0x03, 11]),
            Buffer.from('example.com'),
            Buffer.from([0x01, 0xbb])
        ]));
        expect(buildConnectRequest({ host: '192.168.1.1', port: 80 })).toEqual(Buffer.concat([
            Buffer.from([0x05, 0x01, 0x00, 0x03, 11]),
            Buffer.from('192.168.1.1'),
            Buffer.from([0x00, 0x50])
        ]));
    });

    test('buildUserPassRequest uses single-byte length prefixes', () => {
        expect(buildUserPassRequest('user', 'pw')).toEqual(
            Buffer.from([0x01, 4, 0x75, 0x73, 0x65, 0x72, 2, 0x70, 0x77])
        );
    });

    test('buildUserPassRequest refuses values longer than 255 bytes', () => {
        expect(() => buildUserPassRequest('u'.repeat(256), 'pw')).toThrow(/255 bytes/);
        expect(() => buildUserPassRequest('user', 'é'.repeat(128))).toThrow(/255 bytes/);
    });

    test('buildSuccessReply reports a zeroed IPv4 bind address', () => {
        expect(buildSuccessReply()).toEqual(Buffer.from([5, 0, 0, 1, 0, 0, 0, 0, 0, 0]));
    });
});
