// ניהול מנויי GENA (SUBSCRIBE / UNSUBSCRIBE) ושליחת הודעות NOTIFY.
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import axios from 'axios';
import { create } from 'xmlbuilder2';
import { createModuleLogger, type EventPublisher, type EventVariables } from 'cds-core';

const logger = createModuleLogger('EventSubscriptions');

const EVENT_NS = 'urn:schemas-upnp-org:event-1-0';
const MAX_SEQ = 4294967295;

export interface Subscription {
  sid: string;
  callbacks: string[];
  /** @hebrew מספר ההודעה הבאה שתישלח למנוי. */
  seq: number;
  timeoutSec: number;
  expiresAt: number;
}

/**
 * @hebrew שולח בקשת NOTIFY אחת. נזרקת שגיאה אם השליחה נכשלה.
 */
export type NotifyTransport = (url: string, headers: Record<string, string>, body: string) => Promise<void>;

export const createAxiosTransport = (timeoutMs: number): NotifyTransport => async (url, headers, body) => {
  await axios.request({
    method: 'NOTIFY',
    url,
    headers,
    data: body,
    timeout: timeoutMs,
    responseType: 'text',
  });
};

export interface SubscriptionManagerOptions {
  defaultTimeoutSec: number;
  transport: NotifyTransport;
}

/**
 * @hebrew מחלץ את כתובות ה-http מכותרת CALLBACK ("<http://a/b><http://c/d>").
 */
export function parseCallbackHeader(header: string | undefined): string[] {
  if (!header) {
    return [];
  }
  return [...header.matchAll(/<([^>]+)>/g)]
    .map(match => match[1].trim())
    .filter(url => /^http:\/\//i.test(url));
}

/**
 * @hebrew מפענח כותרת TIMEOUT ("Second-1800"). ערך חסר, "infinite" או שגוי מחזיר את ברירת המחדל.
 */
export function parseTimeoutHeader(header: string | undefined, defaultTimeoutSec: number): number {
  const match = /^Second-(\d+)$/i.exec(header?.trim() ?? '');
  if (!match) {
    return defaultTimeoutSec;
  }
  const seconds = Number(match[1]);
  return seconds > 0 ? seconds : defaultTimeoutSec;
}

/**
 * @hebrew גוף הודעת NOTIFY: e:propertyset עם e:property לכל משתנה.
 */
export function buildPropertySet(variables: EventVariables): string {
  const root = create({ version: '1.0', encoding: 'utf-8' }).ele('e:propertyset', { 'xmlns:e': EVENT_NS });
  for (const [name, value] of Object.entries(variables)) {
    root.ele('e:property').ele(name).txt(String(value)).up().up();
  }
  return root.end({ prettyPrint: false });
}

/**
 * @class EventSubscriptionManager
 * @description מחזיק את מנויי ה-GENA של השירות ומממש EventPublisher מעליהם.
 * מפיץ 'expired' (עם ה-SID) כשמנוי פג תוקף ומוסר.
 */
export class EventSubscriptionManager extends EventEmitter implements EventPublisher {
  private readonly subscriptions = new Map<string, Subscription>();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: SubscriptionManagerOptions) {
    super();
  }

  get size(): number {
    return this.subscriptions.size;
  }

  get(sid: string): Subscription | undefined {
    return this.subscriptions.get(sid);
  }

  subscribe(callbacks: string[], timeoutHeader: string | undefined): Subscription {
    const timeoutSec = parseTimeoutHeader(timeoutHeader, this.options.defaultTimeoutSec);
    const subscription: Subscription = {
      sid: `uuid:${randomUUID()}`,
      callbacks,
      seq: 0,
      timeoutSec,
      expiresAt: Date.now() + timeoutSec * 1000,
    };
    this.subscriptions.set(subscription.sid, subscription);
    logger.info(`New subscription ${subscription.sid} for ${callbacks.join(', ')} (${timeoutSec}s)`);
    return subscription;
  }

  /**
   * @hebrew מחדש מנוי קיים. מחזיר undefined אם ה-SID לא מוכר או שפג תוקפו.
   */
  renew(sid: string, timeoutHeader: string | undefined): Subscription | undefined {
    this.pruneExpired();
    const subscription = this.subscriptions.get(sid);
    if (!subscription) {
      return undefined;
    }
    subscription.timeoutSec = parseTimeoutHeader(timeoutHeader, this.options.defaultTimeoutSec);
    subscription.expiresAt = Date.now() + subscription.timeoutSec * 1000;
    logger.debug(`Renewed subscription ${sid} for ${subscription.timeoutSec}s`);
    return subscription;
  }

  unsubscribe(sid: string): boolean {
    const removed = this.subscriptions.delete(sid);
    if (removed) {
      logger.info(`Subscription ${sid} cancelled`);
    }
    return removed;
  }

  /**
   * @hebrew מסיר מנויים שפג תוקפם ומפיץ 'expired' לכל אחד מהם.
   */
  pruneExpired(now: number = Date.now()): void {
    for (const [sid, subscription] of this.subscriptions) {
      if (subscription.expiresAt <= now) {
        this.subscriptions.delete(sid);
        logger.info(`Subscription ${sid} expired`);
        this.emit('expired', sid);
      }
    }
  }

  startSweeping(intervalMs: number): void {
    this.stopSweeping();
    this.sweepTimer = setInterval(() => this.pruneExpired(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeping(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  async notifyAll(variables: EventVariables): Promise<void> {
    this.pruneExpired();
    const body = buildPropertySet(variables);
    await Promise.all([...this.subscriptions.values()].map(subscription => this.send(subscription, body)));
  }

  async notifyOne(subscriberId: string, variables: EventVariables): Promise<void> {
    const subscription = this.subscriptions.get(subscriberId);
    if (!subscription) {
      logger.debug(`Subscription ${subscriberId} is gone, skipping event`);
      return;
    }
    await this.send(subscription, buildPropertySet(variables));
  }

  private async send(subscription: Subscription, body: string): Promise<void> {
    const headers = {
      'Content-Type': 'text/xml; charset="utf-8"',
      NT: 'upnp:event',
      NTS: 'upnp:propchange',
      SID: subscription.sid,
      SEQ: String(subscription.seq),
    };
    subscription.seq = subscription.seq >= MAX_SEQ ? 1 : subscription.seq + 1;

    // הכתובות נבדקות לפי הסדר עד להצלחה הראשונה
    for (const url of subscription.callbacks) {
      try {
        await this.options.transport(url, headers, body);
        logger.trace(`NOTIFY SEQ ${headers.SEQ} delivered to ${url}`);
        return;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`NOTIFY to ${url} for ${subscription.sid} failed: ${message}`);
      }
    }
    logger.warn(`No callback of ${subscription.sid} accepted event SEQ ${headers.SEQ}`);
  }
}
