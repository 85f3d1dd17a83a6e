import * as net from 'net';
import { DEFAULT_SHUTDOWN_GRACE_MS, ServerState, SocksServer } from '../../../src/socks5Proxy/SocksServer';
import { ConnectionParameters } from '../../../src/ServerConfigInterface';
import { closeServer, connectClient, listenEphemeral, silentLogger, unusedPort, waitFor } from '../../socketHelpers';

describe('SOCKS5 relay lifecycle', () => {
    let params: ConnectionParameters;

    beforeAll(async () => {
        params = {
            upstreamHost: '127.0.0.1',
            upstreamPort: await unusedPort(),
            username: 'relay-user',
            password: 'test-secret',
            localHost: '127.0.0.1',
            localPort: 0
        };
    });

    test('Should move from created to listening to stopped', async () => {
        const relay = new SocksServer(params, silentLogger());
        expect(relay.getState()).toBe(ServerState.Created);

        await relay.start();
        expect(relay.getState()).toBe(ServerState.Listening);
        expect(relay.address()?.port).toBeGreaterThan(0);

        await relay.stop();
        expect(relay.getState()).toBe(ServerState.Stopped);
        expect(relay.address()).toBeNull();
    });

    test('Stop right after start should return well before the grace period', async () => {
        const relay = new SocksServer(params, silentLogger());
        await relay.start();

        const startedAt = Date.now();
        await relay.stop();

        expect(Date.now() - startedAt).toBeLessThan(DEFAULT_SHUTDOWN_GRACE_MS / 5);
    });

    test('Stop twice should share one shutdown', async () => {
        const relay = new SocksServer(params, silentLogger());
        await relay.start();

        const first = relay.stop();
        const second = relay.stop();

        expect(second).toBe(first);
        await first;
        await expect(relay.stop()).resolves.toBeUndefined();
    });

    test('Start after stop should be a no-op', async () => {
        const logger = silentLogger();
        const warn = jest.spyOn(logger, 'warn');
        const relay = new SocksServer(params, logger);
        await relay.start();
        await relay.stop();

        await relay.start();

        expect(relay.getState()).toBe(ServerState.Stopped);
        expect(relay.address()).toBeNull();
        expect(warn).toHaveBeenCalledWith('Ignoring start request: server is stopped');
    });

    test('Stop on a server that never started should settle', async () => {
        const relay = new SocksServer(params, silentLogger());

        await relay.stop();

        expect(relay.getState()).toBe(ServerState.Stopped);
    });

    test('Stop during a pending start should leave nothing listening', async () => {
        const relay = new SocksServer(params, silentLogger());

        const starting = relay.start();
        expect(relay.getState()).toBe(ServerState.Starting);
        await relay.stop();
        await starting;

        expect(relay.getState()).toBe(ServerState.Stopped);
        expect(relay.address()).toBeNull();
    });

    test('A listener bound after stop should refuse new clients', async () => {
        const port = await unusedPort();
        const relay = new SocksServer(params, silentLogger());

        const starting = relay.start('127.0.0.1', port);
        const stopping = relay.stop();
        await Promise.all([starting, stopping]);

        await expect(connectClient(port)).rejects.toMatchObject({ code: 'ECONNREFUSED' });
    });

    test('A second start during a pending start should be ignored', async () => {
        const logger = silentLogger();
        const warn = jest.spyOn(logger, 'warn');
        const relay = new SocksServer(params, logger);

        const first = relay.start();
        await relay.start();
        await first;

        expect(warn).toHaveBeenCalledWith('Ignoring start request: server is starting');
        expect(relay.getState()).toBe(ServerState.Listening);
        await relay.stop();
    });

    test('Start should reject when the address is already bound', async () => {
        const occupier = net.createServer();
        const port = await listenEphemeral(occupier);
        const relay = new SocksServer(params, silentLogger());

        try {
            await expect(relay.start('127.0.0.1', port)).rejects.toMatchObject({ code: 'EADDRINUSE' });
            expect(relay.getState()).toBe(ServerState.Created);
        } finally {
            await closeServer(occupier);
        }
    });

    test('Stop should wait for a session that finishes within the grace period', async () => {
        const logger = silentLogger();
        const warn = jest.spyOn(logger, 'warn');
        const relay = new SocksServer(params, logger, { shutdownGracePeriodMs: 2000 });
        await relay.start();
        const port = relay.address()?.port ?? 0;

        const idle = await connectClient(port);
        await waitFor(() => relay.activeSessionCount === 1);

        const stopping = relay.stop();
        expect(relay.getState()).toBe(ServerState.ShuttingDown);
        setTimeout(() => idle.destroy(), 50);
        await stopping;

        expect(relay.activeSessionCount).toBe(0);
        expect(warn).not.toHaveBeenCalled();
    });

    test('Stop should give up on sessions still running after the grace period', async () => {
        const logger = silentLogger();
        const warn = jest.spyOn(logger, 'warn');
        const relay = new SocksServer(params, logger, { shutdownGracePeriodMs: 200 });
        await relay.start();
        const port = relay.address()?.port ?? 0;

        const idle = await connectClient(port);
        try {
            await waitFor(() => relay.activeSessionCount === 1);

            const startedAt = Date.now();
            await relay.stop();

            expect(Date.now() - startedAt).toBeGreaterThanOrEqual(150);
            expect(relay.getState()).toBe(ServerState.Stopped);
            expect(relay.activeSessionCount).toBe(1);
            expect(warn).toHaveBeenCalledWith('Shutdown grace period of 200 ms elapsed with 1 session(s) still active');
        } finally {
            idle.destroy();
            await waitFor(() => relay.activeSessionCount === 0);
        }
    });
});
