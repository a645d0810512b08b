import { z } from 'zod';
import type { GameStateSnapshot } from './game';

// ---- Inbound (client -> server) ----

export const moveMessageSchema = z.object({
  type: z.literal('move'),
  position: z.number({ required_error: 'Position is required' }).int('Position must be an integer'),
});

export const getStateMessageSchema = z.object({
  type: z.literal('get_state'),
});

export type MoveMessage = z.infer<typeof moveMessageSchema>;
export type GetStateMessage = z.infer<typeof getStateMessageSchema>;

export interface ClientMessageMap {
  move: MoveMessage;
  get_state: GetStateMessage;
}

export type ClientMessageType = keyof ClientMessageMap;

export const clientMessageSchemas: { [K in ClientMessageType]: z.ZodType<ClientMessageMap[K]> } = {
  move: moveMessageSchema,
  get_state: getStateMessageSchema,
};

export function isClientMessageType(type: string): type is ClientMessageType {
  return Object.prototype.hasOwnProperty.call(clientMessageSchemas, type);
}

// ---- Outbound (server -> client) ----

export type ServerMessage =
  | { type: 'game_state'; data: GameStateSnapshot }
  | { type: 'game_update'; data: GameStateSnapshot }
  | { type: 'error'; message: string };

const markSchema = z.enum(['X', 'O']);

export const snapshotSchema: z.ZodType<GameStateSnapshot> = z.object({
  gameId: z.string(),
  board: z.array(markSchema.nullable()).length(9),
  status: z.enum(['waiting', 'in_progress', 'finished', 'draw']),
  currentTurn: markSchema,
  player1: z.string(),
  player2: z.string().nullable(),
  winner: z.string().nullable(),
  availablePositions: z.array(z.number().int()),
  lastMove: z
    .object({
      participant: z.string(),
      position: z.number().int(),
      symbol: markSchema,
      moveNumber: z.number().int(),
    })
    .nullable(),
  version: z.number().int(),
  createdAt: z.string(),
  finishedAt: z.string().nullable(),
});

export const serverMessageSchema: z.ZodType<ServerMessage> = z.union([
  z.object({ type: z.literal('game_state'), data: snapshotSchema }),
  z.object({ type: z.literal('game_update'), data: snapshotSchema }),
  z.object({ type: z.literal('error'), message: z.string() }),
]);

// ---- Connection close codes ----

export const CloseCodes = {
  Unauthenticated: 4001,
  NotAParticipant: 4003,
  GameNotFound: 4004,
  InternalError: 1011,
} as const;

export type CloseCode = (typeof CloseCodes)[keyof typeof CloseCodes];

// ---- socket.io event maps ----

export interface ClientToServerEvents {
  message: (payload: unknown) => void;
}

export interface ServerToClientEvents {
  message: (message: ServerMessage) => void;
  connection_closed: (info: { code: CloseCode; reason: string }) => void;
}
