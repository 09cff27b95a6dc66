import net from 'net';

/**
 * Single-instance lock: holds an exclusive local TCP bind for the life of the process.
 */
export class InstanceGuard {
    private server?: net.Server;

    constructor(
        private readonly port: number,
        private readonly host: string = '127.0.0.1'
    ) { }

    get boundPort(): number | undefined {
        const address = this.server?.address();
        return address && typeof address === 'object' ? address.port : undefined;
    }

    /**
     * @returns false when another process already holds the port
     */
    acquire(): Promise<boolean> {
        if (this.server) {
            return Promise.resolve(true);
        }
        return new Promise((resolve, reject) => {
            const server = net.createServer();
            server.once('error', (error: NodeJS.ErrnoException) => {
                if (error.code === 'EADDRINUSE' || error.code === 'EACCES') {
                    resolve(false);
                } else {
                    reject(error);
                }
            });
            server.listen({ port: this.port, host: this.host, exclusive: true }, () => {
                this.server = server;
                server.unref();
                resolve(true);
            });
        });
    }

    release(): Promise<void> {
        const server = this.server;
        this.server = undefined;
        if (!server) {
            return Promise.resolve();
        }
        return new Promise((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
    }
}
