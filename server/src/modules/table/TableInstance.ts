import { nanoid } from 'nanoid';
import {
  countPlayersWithChips,
  createInitialGameState,
  getValidActions,
  isHandInProgress,
  processCommand,
  type Action,
  type CommandResult,
  type GameCommand,
  type GameEvent,
  type GameRules,
  type GameState,
  type Rank,
  type Rng,
} from '@indian-poker/shared';
import type { ClientGameState, TableInfo, TableSummary } from '../../shared/types/websocket.js';
import type { ChipLedger } from '../ledger/ChipLedger.js';

import { TABLE_CONSTANTS } from './constants.js';
import type { ClientConnection, MessageLog, RoomEmitter, TableError } from './types.js';
import { AsyncQueue } from './AsyncQueue.js';
import { PlayerManager } from './helpers/PlayerManager.js';
import { BroadcastService } from './helpers/BroadcastService.js';
import { StateTransformer } from './helpers/StateTransformer.js';

export interface TableOptions {
  rules: GameRules;
  ledger: ChipLedger;
  /** Players with chips needed before the first hand is dealt. */
  minPlayersToStart?: number;
  rng?: Rng;
  /** Called once a player no longer belongs to this table. */
  onPlayerRemoved?: (playerId: string, tableId: string) => void;
}

/**
 * One table: owns the game state and applies every command through a serial
 * queue, then relays the resulting events to the seated players.
 */
export class TableInstance {
  public readonly id: string;
  public readonly rules: GameRules;

  private state: GameState;
  private readonly ledger: ChipLedger;
  private readonly minPlayersToStart: number;
  private readonly rng: Rng;
  private readonly onPlayerRemoved?: (playerId: string, tableId: string) => void;

  private readonly queue = new AsyncQueue();
  private readonly playerManager = new PlayerManager();
  private readonly broadcast: BroadcastService;

  constructor(io: RoomEmitter, options: TableOptions) {
    this.id = nanoid(TABLE_CONSTANTS.ID_LENGTH);
    this.rules = options.rules;
    this.ledger = options.ledger;
    this.minPlayersToStart = Math.max(2, options.minPlayersToStart ?? TABLE_CONSTANTS.MIN_PLAYERS_TO_START);
    this.rng = options.rng ?? Math.random;
    this.onPlayerRemoved = options.onPlayerRemoved;
    this.state = createInitialGameState(options.rules);
    this.broadcast = new BroadcastService(io, this.roomName);
  }

  // ============================================
  // Public methods
  // ============================================

  /**
   * Buys the player in for the starting stack and seats them.
   * Resolves with the rejection, or null once seated.
   */
  public seatPlayer(playerId: string, name: string, connection: ClientConnection): Promise<TableError | null> {
    return this.queue.enqueue(async () => {
      const result = this.execute({ type: 'JOIN', playerId, name });
      if (result.error) return result.error;

      const debited = await this.ledger.debitChips(playerId, this.rules.startingStack);
      if (!debited) {
        return {
          code: 'INSUFFICIENT_BALANCE',
          message: `Balance does not cover the ${this.rules.startingStack}-chip buy-in`,
        };
      }

      this.state = result.state;
      this.playerManager.add({ playerId, name, connection });
      connection.join(this.roomName);

      const seat = this.state.participants.findIndex(p => p.id === playerId);
      this.broadcast.emitToSocket(connection, playerId, 'table:joined', { tableId: this.id, seat });

      await this.relayEvents(result.events);
      await this.maybeStartHand();
      this.broadcastGameState();
      return null;
    });
  }

  /**
   * Between hands the player is cashed out at once. During a hand they are
   * folded now and cashed out when the hand settles.
   */
  public unseatPlayer(playerId: string): Promise<TableError | null> {
    return this.queue.enqueue(async () => {
      if (this.state.tableWinnerId !== null) {
        return { code: 'TABLE_FINISHED', message: 'Table has finished' };
      }

      const result = this.execute({ type: 'LEAVE', playerId });
      if (result.error) return result.error;

      this.state = result.state;
      await this.relayEvents(result.events);
      // still owed chips from the running hand, but no longer at the table
      this.detach(playerId, 'table:left');

      await this.maybeStartHand();
      this.broadcastGameState();
      return null;
    });
  }

  public handleAction(playerId: string, action: Action, amount: number = 0): Promise<TableError | null> {
    return this.queue.enqueue(async () => {
      const result = this.execute({ type: 'PLAYER_ACTION', playerId, action, amount });
      if (result.error) return result.error;

      this.state = result.state;
      await this.relayEvents(result.events);
      await this.maybeStartHand();
      this.broadcastGameState();
      return null;
    });
  }

  public get isHandInProgress(): boolean {
    return isHandInProgress(this.state);
  }

  public get isFinished(): boolean {
    return this.state.tableWinnerId !== null;
  }

  public getPlayerCount(): number {
    return this.state.participants.length;
  }

  public hasAvailableSeat(): boolean {
    return !this.isFinished && this.state.participants.length < this.rules.maxPlayers;
  }

  public getTableInfo(): TableInfo {
    return StateTransformer.toTableInfo(this.id, this.state);
  }

  public getTableSummary(): TableSummary {
    return StateTransformer.toTableSummary(this.id, this.state);
  }

  public getClientGameState(viewerId: string | null): ClientGameState {
    return StateTransformer.toClientGameState(this.id, this.state, viewerId);
  }

  public getMessageLog(): MessageLog[] {
    return this.broadcast.getMessageLog();
  }

  // ============================================
  // Private methods
  // ============================================

  private get roomName(): string {
    return `table:${this.id}`;
  }

  private execute(command: GameCommand): CommandResult {
    return processCommand(this.state, command, { rng: this.rng });
  }

  private async maybeStartHand(): Promise<void> {
    if (this.isHandInProgress || this.isFinished) return;
    if (countPlayersWithChips(this.state) < this.minPlayersToStart) return;

    const result = this.execute({ type: 'START_HAND' });
    if (result.error) {
      console.warn(`[Table ${this.id}] Hand not started: ${result.error.message}`);
      return;
    }

    this.state = result.state;
    await this.relayEvents(result.events);
  }

  private async relayEvents(events: GameEvent[]): Promise<void> {
    for (const event of events) {
      switch (event.type) {
        case 'PLAYER_JOINED':
          this.broadcast.emitToRoom('table:player_joined', {
            playerId: event.playerId,
            name: this.playerManager.get(event.playerId)?.name ?? event.playerId,
            seat: event.seatIndex,
            chips: event.chips,
            sittingOut: event.sittingOut,
          });
          break;

        case 'HAND_STARTED':
          this.broadcast.emitToRoom('game:hand_started', {
            handNumber: event.handNumber,
            ante: event.ante,
            pot: event.pot,
            firstToActId: event.firstToActId,
          });
          break;

        case 'CARDS_DEALT':
          this.sendCards(event.handNumber, event.cards);
          break;

        case 'ACTION_TAKEN':
          this.broadcast.emitToRoom('game:action_taken', {
            playerId: event.playerId,
            action: event.action,
            amount: event.amount,
          });
          break;

        case 'FOLD_PENALTY':
          this.broadcast.emitToRoom('game:fold_penalty', { playerId: event.playerId, amount: event.amount });
          break;

        case 'TIE_REDRAW':
          this.broadcast.emitToRoom('game:tie_redraw', { round: event.round, cards: event.cards });
          break;

        case 'SHOWDOWN_RESULT':
          this.broadcast.emitToRoom('game:showdown', {
            winnerId: event.winnerId,
            amount: event.amount,
            cards: event.cards,
            refunds: event.refunds,
          });
          break;

        case 'HAND_FINISHED':
          this.broadcast.emitToRoom('game:hand_complete', {
            handNumber: event.handNumber,
            winnerId: event.winnerId,
            amount: event.amount,
            byFold: event.byFold,
          });
          break;

        case 'PLAYER_REMOVED':
          await this.cashOut(event.playerId, event.chips);
          this.detach(event.playerId, event.reason === 'busted' ? 'table:busted' : 'table:left');
          this.broadcast.emitToRoom('table:player_left', {
            playerId: event.playerId,
            chips: event.chips,
            reason: event.reason,
          });
          break;

        case 'TABLE_FINISHED':
          console.log(`[Table ${this.id}] Finished, ${event.winnerId} holds all ${event.chips} chips`);
          await this.cashOut(event.winnerId, event.chips);
          this.broadcast.emitToRoom('table:finished', { winnerId: event.winnerId, chips: event.chips });
          this.detach(event.winnerId, 'table:left');
          break;

        default: {
          const unhandled: never = event;
          console.warn(`[Table ${this.id}] Unhandled event`, unhandled);
        }
      }
    }
  }

  /** Each seated player gets every dealt card except their own. */
  private sendCards(handNumber: number, cards: Record<string, Rank>): void {
    this.playerManager.forEachPlayer(seat => {
      const visible: Record<string, Rank> = {};
      for (const [id, card] of Object.entries(cards)) {
        if (id !== seat.playerId) visible[id] = card;
      }
      this.broadcast.emitToSocket(seat.connection, seat.playerId, 'game:cards', { handNumber, cards: visible });
    });
  }

  private async cashOut(playerId: string, chips: number): Promise<void> {
    if (chips <= 0) return;
    try {
      await this.ledger.creditChips(playerId, chips);
    } catch (e) {
      console.error(`[Table ${this.id}] Cash-out failed:`, playerId, chips, e);
    }
  }

  /** Stops sending table messages to the player and releases them from the table. */
  private detach(playerId: string, notice: 'table:left' | 'table:busted'): void {
    const seat = this.playerManager.remove(playerId);
    if (!seat) return;
    seat.connection.leave(this.roomName);
    this.broadcast.emitToSocket(seat.connection, playerId, notice, { tableId: this.id });
    this.onPlayerRemoved?.(playerId, this.id);
  }

  private broadcastGameState(): void {
    this.playerManager.forEachPlayer(seat => {
      this.broadcast.emitToSocket(seat.connection, seat.playerId, 'game:state', {
        state: this.getClientGameState(seat.playerId),
      });
    });

    if (this.state.phase !== 'betting' || this.state.currentTurn < 0) return;
    const current = this.state.participants[this.state.currentTurn];
    const connection = current && this.playerManager.getConnection(current.id);
    if (current && connection) {
      this.broadcast.emitToSocket(connection, current.id, 'game:action_required', {
        playerId: current.id,
        validActions: getValidActions(this.state, current.id),
      });
    }
  }
}
