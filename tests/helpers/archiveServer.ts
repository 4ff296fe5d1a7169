import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';

export interface ArchiveServerStats {
  inFlight: number;
  maxInFlight: number;
  userAgents: string[];
}

export interface ArchiveServer {
  baseUrl: string;
  stats: ArchiveServerStats;
  close(): Promise<void>;
}

/**
 * In-process HTTP origin serving fake archives:
 *   /ok/:bytes      200 with a body of that many bytes
 *   /status/:code   that status with a short body, or ?len=N bytes of "E"
 *   /slow/:ms       200 after a delay, counting concurrent requests
 *   /truncated      promises 100000 bytes, sends 5000, then drops the connection
 *   /hang           never answers
 */
export async function startArchiveServer(): Promise<ArchiveServer> {
  const stats: ArchiveServerStats = { inFlight: 0, maxInFlight: 0, userAgents: [] };
  const app = express();

  app.use((req: Request, _res: Response, next: NextFunction) => {
    stats.userAgents.push(req.get('user-agent') ?? '');
    next();
  });

  app.get('/ok/:bytes', (req: Request, res: Response) => {
    res.type('application/zip').send(Buffer.alloc(parseInt(req.params.bytes, 10), 0x61));
  });

  app.get('/status/:code', (req: Request, res: Response) => {
    const len = typeof req.query.len === 'string' ? parseInt(req.query.len, 10) : 0;
    res.status(parseInt(req.params.code, 10)).send(len > 0 ? 'E'.repeat(len) : 'upstream exploded');
  });

  app.get('/slow/:ms', (req: Request, res: Response) => {
    stats.inFlight++;
    stats.maxInFlight = Math.max(stats.maxInFlight, stats.inFlight);
    setTimeout(() => {
      stats.inFlight--;
      res.type('application/zip').send(Buffer.alloc(64, 0x62));
    }, parseInt(req.params.ms, 10));
  });

  app.get('/truncated', (_req: Request, res: Response) => {
    res.writeHead(200, { 'Content-Type': 'application/zip', 'Content-Length': '100000' });
    res.write(Buffer.alloc(5000, 0x63), () => {
      setTimeout(() => res.socket?.destroy(), 20);
    });
  });

  app.get('/hang', () => {
    // left open until the client gives up or the server closes
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('archive server is not listening on a TCP port');
  }


  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    stats,
    close: () =>
      new Promise<void>((resolve) => {
        server.closeAllConnections();
        server.close(() => resolve());
      }),
  };
}
