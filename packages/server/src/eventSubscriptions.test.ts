import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  buildPropertySet,
  EventSubscriptionManager,
  parseCallbackHeader,
  parseTimeoutHeader,
  type NotifyTransport,
} from './eventSubscriptions';

const createManager = (transport: NotifyTransport = vi.fn(async () => {})) =>
  new EventSubscriptionManager({ defaultTimeoutSec: 1800, transport });

describe('header parsing', () => {
  it('collects every http callback url in order', () => {
    expect(parseCallbackHeader('<http://10.0.0.2:4000/a><https://10.0.0.3/b> <http://10.0.0.4/c>')).toEqual([
      'http://10.0.0.2:4000/a',
      'http://10.0.0.4/c',
    ]);
    expect(parseCallbackHeader('http://no-brackets/')).toEqual([]);
    expect(parseCallbackHeader(undefined)).toEqual([]);
  });

  it.each([
    ['Second-300', 300],
    ['second-60', 60],
    ['Second-infinite', 1800],
    ['Second-0', 1800],
    ['300', 1800],
    [undefined, 1800],
  ])('reads TIMEOUT %s as %i seconds', (header, seconds) => {
    expect(parseTimeoutHeader(header, 1800)).toBe(seconds);
  });
});

describe('buildPropertySet', () => {
  it('puts each variable in its own e:property', () => {
    expect(buildPropertySet({ SystemUpdateID: 1700000000 })).toBe(
      '<?xml version="1.0" encoding="utf-8"?>'
        + '<e:propertyset xmlns:e="urn:schemas-upnp-org:event-1-0">'
        + '<e:property><SystemUpdateID>1700000000</SystemUpdateID></e:property>'
        + '</e:propertyset>',
    );
  });
});

describe('EventSubscriptionManager', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates subscriptions with a uuid sid and the requested timeout', () => {
    const manager = createManager();
    const subscription = manager.subscribe(['http://10.0.0.2/cb'], 'Second-120');

    expect(subscription.sid).toMatch(/^uuid:[0-9a-f-]{36}$/);
    expect(subscription.timeoutSec).toBe(120);
    expect(subscription.seq).toBe(0);
    expect(manager.size).toBe(1);
    expect(manager.get(subscription.sid)).toBe(subscription);
  });

  it('sends NOTIFY with increasing SEQ values', async () => {
    const transport = vi.fn<NotifyTransport>(async () => {});
    const manager = createManager(transport);
    const { sid } = manager.subscribe(['http://10.0.0.2/cb'], undefined);

    await manager.notifyOne(sid, { SystemUpdateID: 5 });
    await manager.notifyAll({ SystemUpdateID: 6 });

    expect(transport).toHaveBeenCalledTimes(2);
    const [url, headers, body] = transport.mock.calls[0];
    expect(url).toBe('http://10.0.0.2/cb');
    expect(headers).toEqual({
      'Content-Type': 'text/xml; charset="utf-8"',
      NT: 'upnp:event',
      NTS: 'upnp:propchange',
      SID: sid,
      SEQ: '0',
    });
    expect(body).toContain('<SystemUpdateID>5</SystemUpdateID>');
    expect(transport.mock.calls[1][1].SEQ).toBe('1');
    expect(manager.get(sid)?.seq).toBe(2);
  });

  it('wraps SEQ back to 1 after the largest value', async () => {
    const transport = vi.fn<NotifyTransport>(async () => {});
    const manager = createManager(transport);
    const subscription = manager.subscribe(['http://10.0.0.2/cb'], undefined);
    subscription.seq = 4294967295;

    await manager.notifyOne(subscription.sid, { SystemUpdateID: 1 });
    expect(transport.mock.calls[0][1].SEQ).toBe('4294967295');
    expect(subscription.seq).toBe(1);
  });

  it('falls back to the next callback when delivery fails', async () => {
    const transport = vi.fn<NotifyTransport>(async (url) => {
      if (url.includes('first')) {
        throw new Error('connect ECONNREFUSED');
      }
    });
    const manager = createManager(transport);
    const { sid } = manager.subscribe(['http://10.0.0.2/first', 'http://10.0.0.2/second', 'http://10.0.0.2/third'], undefined);

    await manager.notifyOne(sid, { SystemUpdateID: 1 });
    expect(transport.mock.calls.map(([url]) => url)).toEqual(['http://10.0.0.2/first', 'http://10.0.0.2/second']);
  });

  it('never rejects when every callback fails', async () => {
    const manager = createManager(vi.fn<NotifyTransport>(async () => {
      throw new Error('timeout of 5000ms exceeded');
    }));
    const { sid } = manager.subscribe(['http://10.0.0.2/cb'], undefined);
    await expect(manager.notifyAll({ SystemUpdateID: 1 })).resolves.toBeUndefined();
    expect(manager.get(sid)?.seq).toBe(1);
  });

  it('skips events for a subscription that is gone', async () => {
    const transport = vi.fn<NotifyTransport>(async () => {});
    const manager = createManager(transport);
    await manager.notifyOne('uuid:missing', { SystemUpdateID: 1 });
    expect(transport).not.toHaveBeenCalled();
  });

  it('renews and cancels subscriptions', () => {
    const manager = createManager();
    const { sid } = manager.subscribe(['http://10.0.0.2/cb'], 'Second-60');

    expect(manager.renew(sid, 'Second-600')?.timeoutSec).toBe(600);
    expect(manager.renew('uuid:missing', undefined)).toBeUndefined();
    expect(manager.unsubscribe(sid)).toBe(true);
    expect(manager.unsubscribe(sid)).toBe(false);
    expect(manager.size).toBe(0);
  });

  it('drops expired subscriptions and announces them', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval', 'Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));

    const transport = vi.fn<NotifyTransport>(async () => {});
    const manager = createManager(transport);
    const expired = vi.fn();
    manager.on('expired', expired);

    const short = manager.subscribe(['http://10.0.0.2/short'], 'Second-30');
    const long = manager.subscribe(['http://10.0.0.2/long'], 'Second-300');

    vi.setSystemTime(new Date('2024-01-01T00:00:31Z'));
    expect(manager.renew(short.sid, 'Second-30')).toBeUndefined();
    expect(expired).toHaveBeenCalledWith(short.sid);

    await manager.notifyAll({ SystemUpdateID: 1 });
    expect(transport.mock.calls.map(([url]) => url)).toEqual(['http://10.0.0.2/long']);
    expect(manager.get(long.sid)).toBeDefined();
  });

  it('sweeps expired subscriptions on an interval', () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval', 'Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));

    const manager = createManager();
    const expired = vi.fn();
    manager.on('expired', expired);
    const { sid } = manager.subscribe(['http://10.0.0.2/cb'], 'Second-60');

    manager.startSweeping(30_000);
    vi.advanceTimersByTime(60_000);
    expect(expired).toHaveBeenCalledWith(sid);
    expect(manager.size).toBe(0);
    manager.stopSweeping();
  });
});
