import { CommandHistory } from '../../src/client/commands/CommandHistory';
import { ClientCommand } from '../../src/client/commands/ClientCommand';

describe('CommandHistory', () => {
  function filled(): CommandHistory {
    const history = new CommandHistory();
    history.add(ClientCommand.createMoveCommand('white_pawn', [6, 4], [5, 4], 1));
    history.add(ClientCommand.createAttackCommand('white_rook', [1, 7], 2));
    history.add(ClientCommand.createMoveCommand('white_pawn', [5, 4], [4, 4], 3));
    return history;
  }

  it('keeps commands in creation order', () => {
    const history = filled();
    expect(history.size).toBe(3);
    expect(history.getAll().map((c) => c.timestamp)).toEqual([1, 2, 3]);
  });

  it('returns the most recent commands', () => {
    const history = filled();
    expect(history.getRecent(2).map((c) => c.timestamp)).toEqual([2, 3]);
    expect(history.getRecent(10)).toHaveLength(3);
    expect(history.getRecent(0)).toEqual([]);
  });

  it('filters by piece and kind', () => {
    const history = filled();
    expect(history.getByPiece('white_pawn').map((c) => c.timestamp)).toEqual([1, 3]);
    expect(history.getByKind('attack').map((c) => c.pieceId)).toEqual(['white_rook']);
  });

  it('finds by timestamp, optionally narrowed by piece', () => {
    const history = filled();
    expect(history.find(2)?.pieceId).toBe('white_rook');
    expect(history.find(2, 'white_pawn')).toBeUndefined();
  });

  it('reflects status changes of stored commands', () => {
    const history = new CommandHistory();
    const command = ClientCommand.createResignCommand('black_king', 9);
    history.add(command);
    command.markSent(10);

    const snapshot = history.snapshot();
    expect(snapshot.size).toBe(1);
    expect(snapshot.commands[0]?.status).toBe('sent');
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('clears everything', () => {
    const history = filled();
    history.clear();
    expect(history.size).toBe(0);
  });
});
