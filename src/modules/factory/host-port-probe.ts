import { createServer } from 'net';

/** Reports whether something on the host already listens on a port. */
export interface HostPortProbe {
  isInUse(port: number): Promise<boolean>;
}

/** NestJS injection token for HostPortProbe. */
export const HOST_PORT_PROBE = 'HostPortProbe' as const;

/** Binds a throwaway server on the port; a bind error means the port is taken. */
export class NetHostPortProbe implements HostPortProbe {
  isInUse(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const server = createServer();
      server.once('error', () => resolve(true));
      server.once('listening', () => {
        server.close(() => resolve(false));
      });
      server.listen(port, '0.0.0.0');
    });
  }
}
