import { Ring } from '../../src/shared/engine/Ring';
import { EngineErrorCode, InvalidArgument } from '../../src/shared/engine/errors';
import { toRingSnapshot, tokensFromSnapshot } from '../../src/shared/engine/ringSnapshot';
import { ACCELERATOR, DARK_ACCELERATOR } from '../../src/shared/types/token';
import { catalog, el, keysOf, thrownBy } from '../utils/fixtures';

describe('ring snapshots', () => {
  it('stores token keys in index order', () => {
    expect(toRingSnapshot([el(5), ACCELERATOR, DARK_ACCELERATOR])).toEqual({
      version: 1,
      tokens: [5, -1, -2],
    });
  });

  it('resolves keys against the catalog', () => {
    expect(tokensFromSnapshot({ version: 1, tokens: [-2, 7, -1] }, catalog)).toEqual([
      DARK_ACCELERATOR,
      el(7),
      ACCELERATOR,
    ]);
  });

  it('rebuilds a ring without reacting', () => {
    const r = Ring.fromSnapshot({ version: 1, tokens: [3, -1, 3] }, catalog);
    expect(keysOf(r)).toEqual([3, -1, 3]);
  });

  it.each([
    ['a missing version', { tokens: [1] }],
    ['another version', { version: 2, tokens: [1] }],
    ['no tokens', { version: 1, tokens: [] }],
    ['a fractional key', { version: 1, tokens: [1.5] }],
    ['an unknown negative key', { version: 1, tokens: [-3] }],
    ['zero', { version: 1, tokens: [0] }],
    ['a non-object', 'H + H'],
  ])('rejects a snapshot with %s', (_label, value) => {
    const error = thrownBy(() => tokensFromSnapshot(value, catalog));

    expect(error).toBeInstanceOf(InvalidArgument);
    expect(error).toMatchObject({
      code: EngineErrorCode.ARGUMENT_INVALID_SNAPSHOT,
      domain: 'Snapshot',
      message: 'Ring snapshot is invalid',
    });
  });

  it('rejects keys past the catalog', () => {
    expect(() => tokensFromSnapshot({ version: 1, tokens: [1, 200] }, catalog)).toThrow(
      'Ring snapshot references an unknown element: No catalog entry numbered 200 (catalog holds 1..118)'
    );
  });
});
