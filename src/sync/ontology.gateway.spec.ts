import { GraphError } from '../common/errors/graph-error';
import { readUserId, settle } from './ontology.gateway';

describe('readUserId', () => {
  it('reads a trimmed user id from the handshake auth', () => {
    expect(readUserId({ userId: '  user-1 ' })).toBe('user-1');
  });

  it.each([[undefined], [null], ['user-1'], [{}], [{ userId: 42 }], [{ userId: '   ' }]])(
    'returns null for %p',
    (auth) => {
      expect(readUserId(auth)).toBeNull();
    },
  );
});

describe('settle', () => {
  it('wraps a result', async () => {
    expect(await settle(async () => 5, jest.fn())).toEqual({ ok: true, data: 5 });
  });

  it('passes graph errors through as structured replies', async () => {
    const onUnexpected = jest.fn();

    const reply = await settle(async () => {
      throw new GraphError('DepthExceeded', 'too deep');
    }, onUnexpected);

    expect(reply).toEqual({ ok: false, error: { code: 'DepthExceeded', message: 'too deep' } });
    expect(onUnexpected).not.toHaveBeenCalled();
  });

  it('hides other failures behind InternalError', async () => {
    const onUnexpected = jest.fn();
    const failure = new TypeError('secret detail');

    const reply = await settle(async () => {
      throw failure;
    }, onUnexpected);

    expect(reply).toEqual({
      ok: false,
      error: { code: 'InternalError', message: 'Internal error' },
    });
    expect(onUnexpected).toHaveBeenCalledWith(failure);
  });
});
