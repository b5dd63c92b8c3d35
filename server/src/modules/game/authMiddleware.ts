import type { Server, Socket } from 'socket.io';
import { z } from 'zod';

export interface AuthenticatedSocket extends Socket {
  playerId?: string;
  playerName?: string;
}

export interface PlayerIdentity {
  playerId: string;
  name: string;
}

const handshakeSchema = z.object({
  playerId: z.string().trim().min(1).max(64),
  name: z.string().trim().min(1).max(32),
});

// Identity comes from the host application; the table only enforces turn order and phase.
export function resolveIdentity(auth: unknown): PlayerIdentity | null {
  const result = handshakeSchema.safeParse(auth);
  return result.success ? result.data : null;
}

export function setupAuthMiddleware(io: Server): void {
  io.use((socket: AuthenticatedSocket, next) => {
    const identity = resolveIdentity(socket.handshake.auth);
    if (!identity) {
      console.warn(`Socket auth failed: ${socket.id}`);
      return next(new Error('playerId and name are required'));
    }

    socket.playerId = identity.playerId;
    socket.playerName = identity.name;
    return next();
  });
}
