import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createContentDirectoryState, EVENT_RATE, SystemUpdateNotifier } from './systemUpdateNotifier';

const START = 1_700_000_000_000;

const createNotifier = (systemUpdateId = 100) => {
  const publisher = {
    notifyAll: vi.fn(),
    notifyOne: vi.fn(),
  };
  const notifier = new SystemUpdateNotifier(createContentDirectoryState(systemUpdateId), publisher);
  return { notifier, publisher };
};

describe('SystemUpdateNotifier', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends the current value to a new subscriber immediately', () => {
    const { notifier, publisher } = createNotifier();
    notifier.subscribe('uuid:sub-1');

    expect(publisher.notifyOne).toHaveBeenCalledWith('uuid:sub-1', { SystemUpdateID: 100 });
    expect(notifier.state.subscribers).toBe(1);
    expect(notifier.state.lastEventedAt).toBe(START);
  });

  it('only records the new id when nobody is subscribed', () => {
    const { notifier, publisher } = createNotifier();
    notifier.rescanCompleted(500);

    expect(notifier.state.systemUpdateId).toBe(500);
    expect(notifier.pending).toBe(false);
    expect(publisher.notifyAll).not.toHaveBeenCalled();
  });

  it('never lowers the SystemUpdateID', () => {
    const { notifier } = createNotifier(100);
    notifier.rescanCompleted(50);
    expect(notifier.state.systemUpdateId).toBe(100);
  });

  it('מאחד שני סיומי סריקה בהפרש 50ms לשידור אחד', () => {
    const { notifier, publisher } = createNotifier();
    notifier.subscribe('uuid:sub-1');
    vi.advanceTimersByTime(1000);

    notifier.rescanCompleted(150);
    vi.advanceTimersByTime(50);
    notifier.rescanCompleted(160);

    vi.advanceTimersByTime(EVENT_RATE - 51);
    expect(publisher.notifyAll).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(publisher.notifyAll).toHaveBeenCalledTimes(1);
    expect(publisher.notifyAll).toHaveBeenCalledWith({ SystemUpdateID: 160 });
    expect(notifier.state.lastEventedAt).toBe(START + 1000 + EVENT_RATE);
    expect(notifier.pending).toBe(false);
  });

  it('keeps the rate limit against an event sent during the burst', () => {
    const { notifier, publisher } = createNotifier();
    notifier.subscribe('uuid:sub-1');
    vi.advanceTimersByTime(1000);

    notifier.rescanCompleted(150);
    vi.advanceTimersByTime(100);
    notifier.subscribe('uuid:sub-2');
    notifier.rescanCompleted(151);

    vi.advanceTimersByTime(EVENT_RATE - 1);
    expect(publisher.notifyAll).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(publisher.notifyAll).toHaveBeenCalledWith({ SystemUpdateID: 151 });
  });

  it('starts a new burst after a broadcast', () => {
    const { notifier, publisher } = createNotifier();
    notifier.subscribe('uuid:sub-1');
    vi.advanceTimersByTime(1000);

    notifier.rescanCompleted(150);
    vi.advanceTimersByTime(EVENT_RATE);
    vi.advanceTimersByTime(50);
    notifier.rescanCompleted(170);
    vi.advanceTimersByTime(EVENT_RATE);

    expect(publisher.notifyAll).toHaveBeenCalledTimes(2);
    expect(publisher.notifyAll).toHaveBeenLastCalledWith({ SystemUpdateID: 170 });
  });

  it('cancels a pending broadcast when the last subscriber leaves', () => {
    const { notifier, publisher } = createNotifier();
    notifier.subscribe('uuid:sub-1');
    notifier.rescanCompleted(150);
    expect(notifier.pending).toBe(true);

    notifier.unsubscribe();
    expect(notifier.pending).toBe(false);
    vi.advanceTimersByTime(EVENT_RATE * 5);
    expect(publisher.notifyAll).not.toHaveBeenCalled();

    notifier.unsubscribe();
    expect(notifier.state.subscribers).toBe(0);
  });

  it('rate limits a signal after cancel from that signal, not from the cancelled burst', () => {
    const { notifier, publisher } = createNotifier();
    notifier.subscribe('uuid:sub-1');
    vi.advanceTimersByTime(1000);

    notifier.rescanCompleted(150);
    vi.advanceTimersByTime(50);
    notifier.cancel();
    expect(notifier.pending).toBe(false);

    vi.advanceTimersByTime(950);
    expect(publisher.notifyAll).not.toHaveBeenCalled();

    notifier.rescanCompleted(160);
    vi.advanceTimersByTime(EVENT_RATE - 1);
    expect(publisher.notifyAll).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(publisher.notifyAll).toHaveBeenCalledTimes(1);
    expect(publisher.notifyAll).toHaveBeenCalledWith({ SystemUpdateID: 160 });
    expect(notifier.state.lastEventedAt).toBe(START + 2000 + EVENT_RATE);
  });

  it('does not throw when delivery fails', async () => {
    const { notifier, publisher } = createNotifier();
    publisher.notifyOne.mockRejectedValueOnce(new Error('subscriber unreachable'));
    publisher.notifyAll.mockImplementationOnce(() => {
      throw new Error('subscriber unreachable');
    });

    expect(() => notifier.subscribe('uuid:sub-1')).not.toThrow();
    notifier.rescanCompleted(150);
    expect(() => vi.advanceTimersByTime(EVENT_RATE)).not.toThrow();
    expect(publisher.notifyAll).toHaveBeenCalledTimes(1);
  });
});
