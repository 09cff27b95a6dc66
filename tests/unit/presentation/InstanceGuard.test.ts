import { InstanceGuard } from '../../../src/presentation/InstanceGuard';

describe('InstanceGuard', () => {
    const guards: InstanceGuard[] = [];

    function guard(port: number): InstanceGuard {
        const created = new InstanceGuard(port);
        guards.push(created);
        return created;
    }

    afterEach(async () => {
        await Promise.all(guards.splice(0).map((g) => g.release()));
    });

    it('should acquire a free port', async () => {
        const first = guard(0);

        await expect(first.acquire()).resolves.toBe(true);
        expect(first.boundPort).toEqual(expect.any(Number));
    });

    it('should refuse a second instance on the same port', async () => {
        const first = guard(0);
        await first.acquire();
        const port = first.boundPort;
        if (port === undefined) {
            throw new Error('expected a bound port');
        }

        await expect(guard(port).acquire()).resolves.toBe(false);
    });

    it('should be idempotent for the holder', async () => {
        const first = guard(0);

        await first.acquire();
        const port = first.boundPort;

        await expect(first.acquire()).resolves.toBe(true);
        expect(first.boundPort).toBe(port);
    });

    it('should free the port on release', async () => {
        const first = guard(0);
        await first.acquire();
        const port = first.boundPort;
        if (port === undefined) {
            throw new Error('expected a bound port');
        }

        await first.release();

        expect(first.boundPort).toBeUndefined();
        await expect(guard(port).acquire()).resolves.toBe(true);
    });
});
