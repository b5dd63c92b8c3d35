import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CLASSIC_RULES } from '@indian-poker/shared';
import { InMemoryChipLedger } from '../../ledger/InMemoryChipLedger.js';
import {
  createMockSocket,
  createTestTable,
  seatPlayers,
  getSocketEmits,
  getRoomEmits,
  lastOf,
  resetSocketCounter,
} from './testHelpers.js';

beforeEach(() => {
  resetSocketCounter();
});

// ============================================
// A. Seating
// ============================================

describe('TableInstance - seating', () => {
  it('buys the player in and joins the table room', async () => {
    const { table, ledger } = createTestTable({ minPlayersToStart: 3 });
    const socket = createMockSocket();

    const error = await table.seatPlayer('alice', 'Alice', socket);

    expect(error).toBeNull();
    expect(await ledger.queryBalance('alice')).toBe(980);
    expect(socket.join).toHaveBeenCalledWith(`table:${table.id}`);
    expect(getSocketEmits(socket, 'table:joined')).toEqual([{ tableId: table.id, seat: 0 }]);
    expect(table.getPlayerCount()).toBe(1);
    expect(table.isHandInProgress).toBe(false);
  });

  it('announces the new player to the room', async () => {
    const { table, io } = createTestTable({ minPlayersToStart: 3 });
    await seatPlayers(table, ['alice']);

    expect(getRoomEmits(io, 'table:player_joined')).toEqual([
      { playerId: 'alice', name: 'ALICE', seat: 0, chips: 20, sittingOut: false },
    ]);
  });

  it('refuses a player whose balance does not cover the buy-in', async () => {
    const { table, ledger } = createTestTable({ ledger: new InMemoryChipLedger(10) });
    const socket = createMockSocket();

    const error = await table.seatPlayer('alice', 'Alice', socket);

    expect(error).toEqual({
      code: 'INSUFFICIENT_BALANCE',
      message: 'Balance does not cover the 20-chip buy-in',
    });
    expect(await ledger.queryBalance('alice')).toBe(10);
    expect(table.getPlayerCount()).toBe(0);
    expect(socket.join).not.toHaveBeenCalled();
  });

  it('refuses a second seat for the same player without charging again', async () => {
    const { table, ledger } = createTestTable({ minPlayersToStart: 3 });
    await seatPlayers(table, ['alice']);

    const error = await table.seatPlayer('alice', 'Alice', createMockSocket());

    expect(error?.code).toBe('ALREADY_SEATED');
    expect(await ledger.queryBalance('alice')).toBe(980);
  });

  it('refuses a player once every seat is taken', async () => {
    const { table } = createTestTable({ rules: { ...CLASSIC_RULES, maxPlayers: 2 }, minPlayersToStart: 3 });
    await seatPlayers(table, ['alice', 'bob']);

    expect(table.hasAvailableSeat()).toBe(false);
    const error = await table.seatPlayer('carol', 'Carol', createMockSocket());
    expect(error?.code).toBe('TABLE_FULL');
  });

  it('seats concurrent joins one at a time', async () => {
    const { table } = createTestTable({ minPlayersToStart: 4 });
    const sockets = [createMockSocket(), createMockSocket(), createMockSocket()];

    const errors = await Promise.all(
      ['alice', 'bob', 'carol'].map((id, i) => table.seatPlayer(id, id, sockets[i]))
    );

    expect(errors).toEqual([null, null, null]);
    expect(sockets.map(s => getSocketEmits(s, 'table:joined'))).toEqual([
      [{ tableId: table.id, seat: 0 }],
      [{ tableId: table.id, seat: 1 }],
      [{ tableId: table.id, seat: 2 }],
    ]);
  });
});

// ============================================
// B. Dealing and card visibility
// ============================================

describe('TableInstance - dealing', () => {
  it('deals a hand once enough players are seated', async () => {
    const { table, io } = createTestTable();
    await seatPlayers(table, ['alice', 'bob']);

    expect(table.isHandInProgress).toBe(true);
    expect(getRoomEmits(io, 'game:hand_started')).toEqual([
      { handNumber: 1, ante: 1, pot: 2, firstToActId: 'alice' },
    ]);
  });

  it('sends each player every card but their own', async () => {
    const { table } = createTestTable();
    const sockets = await seatPlayers(table, ['alice', 'bob']);

    expect(getSocketEmits(sockets.alice, 'game:cards')).toEqual([{ handNumber: 1, cards: { bob: 3 } }]);
    expect(getSocketEmits(sockets.bob, 'game:cards')).toEqual([{ handNumber: 1, cards: { alice: 2 } }]);
  });

  it('hides the viewer\'s own card in the state it is sent', async () => {
    const { table } = createTestTable();
    const sockets = await seatPlayers(table, ['alice', 'bob']);

    expect(lastOf(getSocketEmits(sockets.alice, 'game:state'))).toMatchObject({
      state: { viewerId: 'alice', participants: [{ id: 'alice', card: null }, { id: 'bob', card: 3 }] },
    });
    expect(table.getClientGameState('bob').participants.map(p => p.card)).toEqual([2, null]);
  });

  it('never broadcasts cards to the whole room', async () => {
    const { table, io } = createTestTable();
    await seatPlayers(table, ['alice', 'bob']);

    expect(getRoomEmits(io, 'game:cards')).toEqual([]);
    expect(getRoomEmits(io, 'game:state')).toEqual([]);
  });

  it('asks the player to act with their legal actions', async () => {
    const { table } = createTestTable();
    const sockets = await seatPlayers(table, ['alice', 'bob']);

    expect(lastOf(getSocketEmits(sockets.alice, 'game:action_required'))).toEqual({
      playerId: 'alice',
      validActions: [
        { action: 'fold', minAmount: 0, maxAmount: 0 },
        { action: 'check', minAmount: 0, maxAmount: 0 },
        { action: 'bet', minAmount: 1, maxAmount: 19 },
      ],
    });
    expect(getSocketEmits(sockets.bob, 'game:action_required')).toEqual([]);
  });

  it('seats a player who arrives mid-hand as sitting out', async () => {
    const { table } = createTestTable();
    await seatPlayers(table, ['alice', 'bob']);
    const sockets = await seatPlayers(table, ['carol']);

    expect(table.getClientGameState('carol').participants[2]).toMatchObject({ sittingOut: true, folded: true });
    expect(getSocketEmits(sockets.carol, 'game:cards')).toEqual([]);
  });
});

// ============================================
// C. Actions
// ============================================

describe('TableInstance - actions', () => {
  it('rejects an action out of turn and leaves the hand as it was', async () => {
    const { table } = createTestTable();
    await seatPlayers(table, ['alice', 'bob']);

    const error = await table.handleAction('bob', 'check');

    expect(error).toEqual({ code: 'NOT_YOUR_TURN', message: 'Another player is to act' });
    expect(table.getClientGameState(null).currentTurnPlayerId).toBe('alice');
  });

  it('relays the action and moves the turn on', async () => {
    const { table, io } = createTestTable();
    const sockets = await seatPlayers(table, ['alice', 'bob']);

    expect(await table.handleAction('alice', 'bet', 5)).toBeNull();

    expect(getRoomEmits(io, 'game:action_taken')).toEqual([{ playerId: 'alice', action: 'bet', amount: 5 }]);
    expect(lastOf(getSocketEmits(sockets.bob, 'game:action_required'))).toMatchObject({ playerId: 'bob' });
    expect(table.getClientGameState(null).pot).toBe(7);
  });

  it('settles a showdown and deals the next hand', async () => {
    const { table, io } = createTestTable();
    await seatPlayers(table, ['alice', 'bob']);

    await table.handleAction('alice', 'check');
    await table.handleAction('bob', 'check');

    expect(getRoomEmits(io, 'game:showdown')).toEqual([
      { winnerId: 'bob', amount: 2, cards: { alice: 2, bob: 3 }, refunds: {} },
    ]);
    expect(getRoomEmits(io, 'game:hand_complete')).toEqual([
      { handNumber: 1, winnerId: 'bob', amount: 2, byFold: false },
    ]);

    // antes for hand 2 are already in, and the winner acts first
    const view = table.getClientGameState(null);
    expect(view.handNumber).toBe(2);
    expect(view.participants.map(p => p.chips)).toEqual([18, 20]);
    expect(view.currentTurnPlayerId).toBe('bob');
  });
});

// ============================================
// D. Leaving and cash-out
// ============================================

describe('TableInstance - leaving', () => {
  it('cashes out a player who leaves between hands', async () => {
    const { table, io, ledger } = createTestTable({ minPlayersToStart: 3 });
    const sockets = await seatPlayers(table, ['alice', 'bob']);

    expect(await table.unseatPlayer('alice')).toBeNull();

    expect(await ledger.queryBalance('alice')).toBe(1000);
    expect(sockets.alice.leave).toHaveBeenCalledWith(`table:${table.id}`);
    expect(getSocketEmits(sockets.alice, 'table:left')).toEqual([{ tableId: table.id }]);
    expect(getRoomEmits(io, 'table:player_left')).toEqual([{ playerId: 'alice', chips: 20, reason: 'left' }]);
    expect(table.getPlayerCount()).toBe(1);
  });

  it('reports NOT_SEATED for a stranger', async () => {
    const { table } = createTestTable();
    const error = await table.unseatPlayer('nobody');
    expect(error?.code).toBe('NOT_SEATED');
  });

  it('folds a heads-up leaver and finishes the table', async () => {
    const onPlayerRemoved = vi.fn();
    const { table, io, ledger } = createTestTable({ onPlayerRemoved });
    const sockets = await seatPlayers(table, ['alice', 'bob']);

    await table.unseatPlayer('alice');

    // alice gave up the ante, bob took both
    expect(await ledger.queryBalance('alice')).toBe(999);
    expect(await ledger.queryBalance('bob')).toBe(1001);
    expect(table.isFinished).toBe(true);
    expect(getRoomEmits(io, 'table:finished')).toEqual([{ winnerId: 'bob', chips: 21 }]);
    expect(getSocketEmits(sockets.alice, 'table:left')).toEqual([{ tableId: table.id }]);
    expect(getSocketEmits(sockets.bob, 'table:left')).toEqual([{ tableId: table.id }]);
    expect(onPlayerRemoved.mock.calls).toEqual([['alice', table.id], ['bob', table.id]]);
  });

  it('refuses to unseat anyone after the table has finished', async () => {
    const { table } = createTestTable();
    await seatPlayers(table, ['alice', 'bob']);
    await table.unseatPlayer('alice');

    const error = await table.unseatPlayer('bob');
    expect(error).toEqual({ code: 'TABLE_FINISHED', message: 'Table has finished' });
  });

  it('removes a busted player and pays the champion', async () => {
    // a one-chip stack is all-in on the ante, so the first hand settles on the deal
    const onPlayerRemoved = vi.fn();
    const { table, ledger } = createTestTable({
      rules: { ...CLASSIC_RULES, startingStack: 1 },
      onPlayerRemoved,
    });
    const sockets = await seatPlayers(table, ['alice', 'bob']);

    expect(getSocketEmits(sockets.alice, 'table:busted')).toEqual([{ tableId: table.id }]);
    expect(await ledger.queryBalance('alice')).toBe(999);
    expect(await ledger.queryBalance('bob')).toBe(1001);
    expect(table.isFinished).toBe(true);
    expect(table.hasAvailableSeat()).toBe(false);
    expect(onPlayerRemoved).toHaveBeenCalledTimes(2);
  });
});

// ============================================
// E. Lobby views
// ============================================

describe('TableInstance - lobby views', () => {
  it('summarises the table without cards', async () => {
    const { table } = createTestTable();
    await seatPlayers(table, ['alice', 'bob']);

    const summary = table.getTableSummary();

    expect(summary).toMatchObject({
      id: table.id,
      variant: 'classic',
      players: 2,
      phase: 'betting',
      pot: 2,
      currentTurnPlayerId: 'alice',
    });
    expect(summary.participants[0]).not.toHaveProperty('card');
  });

  it('keeps a bounded log of sent messages', async () => {
    const { table } = createTestTable();
    await seatPlayers(table, ['alice', 'bob']);
    for (let i = 0; i < 30; i++) {
      const turn = table.getClientGameState(null).currentTurnPlayerId;
      if (!turn) break;
      await table.handleAction(turn, 'check');
    }

    expect(table.getMessageLog().length).toBeLessThanOrEqual(50);
  });
});
