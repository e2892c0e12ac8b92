import { WebSocketServer, type RawData, type WebSocket } from 'ws';

import { createLogger, type Logger } from '../logging/logger.js';
import {
  evaluateSceneAt,
  lastFrameOf,
  summarizeEntities,
  type EntitySummary,
  type SceneState,
} from '../recording/query.js';
import type { RecordingDocument } from '../recording/types.js';
import { writeCanonicalJson } from '../serialization/canonicalJson.js';
import { asFiniteNumber, isRecord } from '../validation/issues.js';

export type ViewerHello = {
  type: 'hello';
  applicationId: string;
  timelines: string[];
  frameCount: number;
  entities: EntitySummary[];
};

export type ViewerReply =
  | ViewerHello
  | ({ type: 'scene' } & SceneState)
  | { type: 'error'; message: string };

export const helloMessage = (document: RecordingDocument): ViewerHello => ({
  type: 'hello',
  applicationId: document.applicationId,
  timelines: [...document.timelines],
  frameCount: lastFrameOf(document.entries) + 1,
  entities: summarizeEntities(document.entries),
});

/**
 * Answers one client message. `{"type":"seek","frame":N}` returns the scene at N;
 * `{"type":"hello"}` repeats the greeting.
 */
export const handleViewerMessage = (document: RecordingDocument, raw: string): ViewerReply => {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { type: 'error', message: `Invalid JSON message: ${reason}` };
  }
  if (!isRecord(message)) {
    return { type: 'error', message: 'Message must be a JSON object' };
  }
  if (message.type === 'hello') {
    return helloMessage(document);
  }
  if (message.type === 'seek') {
    const frame = asFiniteNumber(message.frame);
    if (frame === null || !Number.isInteger(frame) || frame < 0) {
      return { type: 'error', message: 'seek requires a non-negative integer "frame"' };
    }
    return { type: 'scene', ...evaluateSceneAt(document.entries, frame) };
  }
  return { type: 'error', message: `Unknown message type ${JSON.stringify(message.type ?? null)}` };
};

export type ViewerServerOptions = {
  port: number;
  host?: string;
  logger?: Logger;
};

export type ViewerServer = {
  readonly server: WebSocketServer;
  close(): Promise<void>;
};

const decodeMessage = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
};

const send = (socket: WebSocket, reply: ViewerReply) => {
  socket.send(writeCanonicalJson(reply));
};

export const startViewerServer = (
  document: RecordingDocument,
  options: ViewerServerOptions,
): Promise<ViewerServer> => {
  const logger = options.logger ?? createLogger('viewer');
  const server = new WebSocketServer({ port: options.port, host: options.host ?? '127.0.0.1' });

  server.on('connection', (socket) => {
    logger.info('client connected');
    send(socket, helloMessage(document));
    socket.on('message', (data) => {
      send(socket, handleViewerMessage(document, decodeMessage(data)));
    });
    socket.on('close', () => {
      logger.info('client disconnected');
    });
  });

  const close = () =>
    new Promise<void>((resolve, reject) => {
      for (const client of server.clients) {
        client.terminate();
      }
      server.close((error) => (error ? reject(error) : resolve()));
    });

  return new Promise((resolve, reject) => {
    server.once('listening', () => {
      logger.info(`listening on ws://${options.host ?? '127.0.0.1'}:${options.port}`, {
        entries: document.entries.length,
      });
      resolve({ server, close });
    });
    server.once('error', reject);
  });
};
