import { createDeadline } from './deadline';

describe('createDeadline', () => {
  beforeEach(() => jest.useFakeTimers());
  afterEach(() => jest.useRealTimers());

  it('should abort once the timeout elapses', () => {
    const deadline = createDeadline(1_000);

    jest.advanceTimersByTime(999);
    expect(deadline.signal.aborted).toBe(false);

    jest.advanceTimersByTime(1);
    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(true);
  });

  it('should follow the parent signal', () => {
    const parent = new AbortController();
    const deadline = createDeadline(1_000, parent.signal);

    parent.abort('client went away');

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toBe('client went away');
    expect(deadline.timedOut()).toBe(false);
    deadline.dispose();
  });

  it('should start aborted when the parent already is', () => {
    const parent = new AbortController();
    parent.abort();

    expect(createDeadline(1_000, parent.signal).signal.aborted).toBe(true);
  });

  it('should not fire after dispose', () => {
    const deadline = createDeadline(1_000);
    deadline.dispose();

    jest.advanceTimersByTime(5_000);
    expect(deadline.signal.aborted).toBe(false);
  });
});
