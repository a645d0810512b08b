import type { Server as HTTPServer } from 'http';
import { Server, type Socket } from 'socket.io';
import { env } from '../config/env';
import { bearerToken, verifyToken } from '../lib/jwt';
import { errorMeta, logger } from '../lib/logger';
import type { RealtimeHub } from '../realtime/hub';
import type { GameService } from '../services/gameService';
import type { ClientToServerEvents, ServerToClientEvents } from '../types/messages';
import { GameConnection, type Authenticator, type ClientTransport } from './connection';

export interface SocketServerDeps {
  service: GameService;
  hub: RealtimeHub;
  authenticate?: Authenticator;
}

type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

export const jwtAuthenticator: Authenticator = (token) => {
  if (!token) return null;
  const payload = verifyToken(token);
  return payload ? { id: payload.id, username: payload.username } : null;
};

function handshakeToken(socket: GameSocket): string | undefined {
  const authToken: unknown = socket.handshake.auth?.token;
  if (typeof authToken === 'string' && authToken.length > 0) return authToken;
  return bearerToken(socket.handshake.headers['authorization']);
}

function handshakeGameId(socket: GameSocket): string {
  const fromQuery = socket.handshake.query.gameId;
  if (typeof fromQuery === 'string') return fromQuery;
  const fromAuth: unknown = socket.handshake.auth?.gameId;
  return typeof fromAuth === 'string' ? fromAuth : '';
}

function socketTransport(socket: GameSocket): ClientTransport {
  return {
    id: socket.id,
    send: (message) => {
      socket.emit('message', message);
    },
    close: (code, reason) => {
      socket.emit('connection_closed', { code, reason });
      socket.disconnect(true);
    },
  };
}

export function createSocketServer(httpServer: HTTPServer, deps: SocketServerDeps) {
  const io = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    cors: {
      origin: env.corsOrigin,
      methods: ['GET', 'POST'],
    },
  });
  const authenticate = deps.authenticate ?? jwtAuthenticator;

  io.on('connection', (socket) => {
    const sid = socket.id;
    const gameId = handshakeGameId(socket);
    const connection = new GameConnection(gameId, socketTransport(socket), {
      service: deps.service,
      hub: deps.hub,
      authenticate,
    });
    logger.debug('[socket] connected', { socketId: sid, gameId });

    socket.on('message', (payload) => {
      connection.receive(payload).catch((err: unknown) => {
        logger.error('[socket] inbound message crashed', { socketId: sid, gameId, ...errorMeta(err) });
      });
    });

    socket.on('disconnect', (reason) => {
      connection.close();
      logger.debug('[socket] disconnected', { socketId: sid, gameId, reason });
    });

    connection.open(handshakeToken(socket)).catch((err: unknown) => {
      logger.error('[socket] open failed', { socketId: sid, gameId, ...errorMeta(err) });
      socket.disconnect(true);
    });
  });

  return io;
}
