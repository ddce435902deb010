import { beforeEach, describe, expect, it } from '@jest/globals';
import { RemoteClient } from '../../../src/clients';
import { createEndpointKey } from '../../../src/core/endpointKey';
import { Session } from '../../../src/core/session';
import { TransientRemoteError } from '../../../src/utils';
import { MemoryServer, connectionReset, ftpError } from '../../helpers/memoryServer';

const KEY = createEndpointKey('example.org', 21, 'ftp');

function clientConfig() {
    return {
        host: KEY.hostname,
        port: KEY.port,
        protocol: KEY.protocol,
        activeMode: false,
        rejectUnauthorized: true,
        timeout: 1000,
        debug: false
    };
}

describe('Session', () => {
    let server: MemoryServer;
    let session: Session;

    beforeEach(async () => {
        server = new MemoryServer().addFile('/a.txt', 'hello');
        session = new Session(KEY, () => server.factory(clientConfig()), 1000);
        await session.open();
    });

    it('connects once on open', () => {
        expect(session.isConnected()).toBe(true);
        expect(session.getHealth()).toBe('healthy');
        expect(session.getConnectCount()).toBe(1);
    });

    it('runs operations on the connected client', async () => {
        await expect(session.run('SIZE', client => client.getSize('/a.txt'))).resolves.toBe(5);
        expect(server.connections).toBe(1);
    });

    it('never runs two operations at once', async () => {
        let active = 0;
        let maxActive = 0;
        const order: number[] = [];

        const operation = (id: number) => session.run(`op ${id}`, async () => {
            active++;
            maxActive = Math.max(maxActive, active);
            await new Promise(resolve => setTimeout(resolve, 5));
            order.push(id);
            active--;
        });

        await Promise.all([operation(1), operation(2), operation(3)]);

        expect(maxActive).toBe(1);
        expect(order).toEqual([1, 2, 3]);
    });

    it('keeps working after an operation fails', async () => {
        await expect(session.run('SIZE', client => client.getSize('/missing'))).rejects.toThrow('550 No such file');
        await expect(session.run('SIZE', client => client.getSize('/a.txt'))).resolves.toBe(5);
        expect(session.getConnectCount()).toBe(1);
    });

    it('reconnects with a new transport after the connection drops', async () => {
        server.failNext('size', connectionReset(), 1, true);

        await expect(session.run('SIZE', client => client.getSize('/a.txt'))).rejects.toThrow('ECONNRESET');
        expect(session.getHealth()).toBe('degraded');
        expect(session.isConnected()).toBe(false);

        await expect(session.run('SIZE', client => client.getSize('/a.txt'))).resolves.toBe(5);
        expect(session.getConnectCount()).toBe(2);
        expect(server.clientsCreated).toBe(2);
        expect(session.getHealth()).toBe('healthy');
    });

    it('does not reconnect after a permanent reply', async () => {
        server.failNext('size', ftpError(550, 'No such file'));

        await expect(session.run('SIZE', client => client.getSize('/a.txt'))).rejects.toThrow('550');
        expect(session.isConnected()).toBe(true);
        expect(server.clientsCreated).toBe(1);
    });

    it('times out operations that hang', async () => {
        const slow = new Session(KEY, () => server.factory(clientConfig()), 20);
        await slow.open();

        const hanging = (_client: RemoteClient) => new Promise<number>(resolve => setTimeout(() => resolve(1), 200));
        const error = await slow.run('SIZE', hanging).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TransientRemoteError);
        expect(error).toMatchObject({ message: 'SIZE timed out after 20ms' });
        expect(slow.isConnected()).toBe(false);
        await slow.close();
    });

    it('lets an operation run past the timeout when racing is turned off', async () => {
        const slow = new Session(KEY, () => server.factory(clientConfig()), 20);
        await slow.open();

        const steady = (_client: RemoteClient) => new Promise<number>(resolve => setTimeout(() => resolve(7), 60));

        await expect(slow.run('download', steady, { timeout: false })).resolves.toBe(7);
        expect(slow.isConnected()).toBe(true);
        await slow.close();
    });

        it('fails open when the handshake fails', async () => {
        server.failNext('connect', ftpError(530, 'Login incorrect'));
        const failing = new Session(KEY, () => server.factory(clientConfig()), 1000);

        await expect(failing.open()).rejects.toThrow('530 Login incorrect');
        expect(failing.getHealth()).toBe('failed');
        expect(failing.isConnected()).toBe(false);
    });

    it('refuses operations once closed', async () => {
        await session.close();

        expect(session.getHealth()).toBe('disconnected');
        await expect(session.run('SIZE', client => client.getSize('/a.txt'))).rejects.toThrow(
            'Session for ftp://example.org:21 has been closed'
        );
    });
});
