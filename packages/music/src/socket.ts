import WebSocket from 'ws';
import type { FrameData } from './codec.js';

export interface SocketRequest {
  url: string;
  headers: Record<string, string>;
}

export interface SocketHandlers {
  open(): void;
  message(data: FrameData): void;
  close(code: number, reason: string): void;
  error(error: Error): void;
}

export interface NodeSocket {
  send(data: string): Promise<void>;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export type SocketFactory = (request: SocketRequest, handlers: SocketHandlers) => NodeSocket;

export const createWebSocket: SocketFactory = (request, handlers) => {
  const socket = new WebSocket(request.url, { headers: request.headers });

  socket.on('open', () => handlers.open());
  socket.on('message', (data) => handlers.message(data));
  socket.on('close', (code, reason) => handlers.close(code, reason.toString('utf8')));
  socket.on('error', (error) => handlers.error(error));

  return {
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        socket.send(data, (error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
    close: (code, reason) => socket.close(code, reason),
    terminate: () => socket.terminate(),
  };
};
