import { getErrorInfo } from './error-assertions';

describe('getErrorInfo', () => {
  it('keeps message and stack of errors', () => {
    const error = new Error('boom');
    expect(getErrorInfo(error)).toEqual({ message: 'boom', stack: error.stack });
  });

  it('uses strings as the message', () => {
    expect(getErrorInfo('plain')).toEqual({ message: 'plain' });
  });

  it('serializes other values', () => {
    expect(getErrorInfo({ code: 7 }).message).toBe('{"code":7}');
  });

  it('falls back to String for unserializable values', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(getErrorInfo(circular).message).toBe('[object Object]');
    expect(getErrorInfo(undefined).message).toBe('undefined');
  });
});
