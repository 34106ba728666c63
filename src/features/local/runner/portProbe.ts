/**
 * Host port preflight
 */

import net from 'net';

export type PortProbe = (port: number) => Promise<boolean>;

/**
 * Whether something already holds `port`, found by trying to bind it
 */
export const isPortInUse: PortProbe = (port) =>
  new Promise((resolve) => {
    const server = net.createServer();

    server.once('error', () => resolve(true));

    server.once('listening', () => {
      server.close(() => resolve(false));
    });

    server.listen(port);
  });
