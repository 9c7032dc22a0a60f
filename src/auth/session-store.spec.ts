import { LogoutListener } from './interfaces/session.interface';
import { SessionStore } from './session-store';

describe('SessionStore', () => {
  let clock: number;
  let listeners: LogoutListener[];
  let store: SessionStore<string>;

  beforeEach(() => {
    clock = 1_000_000;
    listeners = [];
    store = new SessionStore<string>(
      { sessionTtlSeconds: 60, onLogout: (listener) => listeners.push(listener) },
      () => clock,
    );
  });

  it('should keep a value for one session lifetime after the last write', () => {
    store.set('s1', 'first');

    clock += 59_999;
    expect(store.get('s1')).toBe('first');

    store.set('s1', 'second');
    clock += 59_999;
    expect(store.get('s1')).toBe('second');

    clock += 1;
    expect(store.get('s1')).toBeUndefined();
  });

  it('should sweep entries of sessions that simply expired', () => {
    store.set('s1', 'a');
    store.set('s2', 'b');
    clock += 30_000;
    store.set('s3', 'c');

    clock += 30_000;

    expect(store.size).toBe(1);
    expect(store.get('s3')).toBe('c');
  });

  it('should drop the entry when its session logs out', () => {
    store.set('s1', 'a');
    store.set('s2', 'b');

    listeners.forEach((listener) => listener('s1'));

    expect(store.get('s1')).toBeUndefined();
    expect(store.get('s2')).toBe('b');
  });
});
