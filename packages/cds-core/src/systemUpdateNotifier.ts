import { createModuleLogger } from './logger';

const logger = createModuleLogger('SystemUpdateNotifier');

/** @hebrew המרווח המינימלי בין שני שידורי SystemUpdateID (מילישניות). */
export const EVENT_RATE = 200;

/**
 * @hebrew המצב המשותף של שירות ה-ContentDirectory.
 */
export interface ContentDirectoryState {
  /** @hebrew זמן סיום הסריקה האחרונה (שניות מאז epoch). לא יורד לעולם. */
  systemUpdateId: number;
  subscribers: number;
  /** @hebrew מתי נשלח האירוע האחרון (מילישניות מאז epoch), 0 אם לא נשלח. */
  lastEventedAt: number;
}

export type EventVariables = Record<string, string | number>;

/**
 * @hebrew ערוץ המסירה של אירועים (למשל GENA NOTIFY).
 */
export interface EventPublisher {
  notifyAll(variables: EventVariables): void | Promise<void>;
  notifyOne(subscriberId: string, variables: EventVariables): void | Promise<void>;
}

export function createContentDirectoryState(lastScanTime: number): ContentDirectoryState {
  return { systemUpdateId: lastScanTime, subscribers: 0, lastEventedAt: 0 };
}

/**
 * @hebrew שולח את SystemUpdateID למנויים, לא יותר מפעם ב-EVENT_RATE.
 * רצף של סיומי סריקה מתאחד לשידור אחד: טיימר יחיד מבוטל ומתוזמן מחדש בכל אות,
 * והשידור יוצא EVENT_RATE אחרי האות הראשון ברצף (או אחרי השידור הקודם, המאוחר מביניהם).
 */
export class SystemUpdateNotifier {
  private timer: NodeJS.Timeout | null = null;
  private burstStartedAt: number | null = null;

  constructor(
    readonly state: ContentDirectoryState,
    private readonly publisher: EventPublisher,
  ) {}

  get pending(): boolean {
    return this.timer !== null;
  }

  /**
   * @hebrew נקרא בסיום סריקת ספרייה.
   * @param scanTime - זמן הסריקה בשניות; ברירת המחדל היא עכשיו.
   */
  rescanCompleted(scanTime: number = Math.floor(Date.now() / 1000)): void {
    this.state.systemUpdateId = Math.max(this.state.systemUpdateId, scanTime);

    if (this.state.subscribers === 0) {
      logger.debug(`SystemUpdateID is now ${this.state.systemUpdateId}, no subscribers to notify`);
      return;
    }

    const now = Date.now();
    if (this.burstStartedAt === null) {
      this.burstStartedAt = now;
    }
    const sendAt = Math.max(this.burstStartedAt + EVENT_RATE, this.state.lastEventedAt + EVENT_RATE);

    this.clearTimer();
    this.timer = setTimeout(() => this.broadcast(), Math.max(0, sendAt - now));
    logger.trace(`SystemUpdateID broadcast scheduled in ${Math.max(0, sendAt - now)}ms`);
  }

  /**
   * @hebrew מנוי חדש מקבל מיד את הערך הנוכחי, ללא הגבלת קצב.
   */
  subscribe(subscriberId: string): void {
    this.state.subscribers++;
    this.state.lastEventedAt = Date.now();
    logger.debug(`Subscriber ${subscriberId} added (${this.state.subscribers} total)`);
    this.deliver(() => this.publisher.notifyOne(subscriberId, this.variables()));
  }

  unsubscribe(): void {
    if (this.state.subscribers > 0) {
      this.state.subscribers--;
    }
    if (this.state.subscribers === 0) {
      this.cancel();
    }
  }

  /** @hebrew מבטל שידור ממתין (למשל בכיבוי השרת). */
  cancel(): void {
    this.clearTimer();
    this.burstStartedAt = null;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private variables(): EventVariables {
    return { SystemUpdateID: this.state.systemUpdateId };
  }

  private broadcast(): void {
    this.timer = null;
    this.burstStartedAt = null;
    this.state.lastEventedAt = Date.now();
    logger.info(`Broadcasting SystemUpdateID ${this.state.systemUpdateId} to ${this.state.subscribers} subscriber(s)`);
    this.deliver(() => this.publisher.notifyAll(this.variables()));
  }

  private deliver(send: () => void | Promise<void>): void {
    const onError = (error: unknown) => logger.error('Failed to deliver SystemUpdateID event', { error });
    try {
      const result = send();
      if (result instanceof Promise) {
        result.catch(onError);
      }
    } catch (error) {
      onError(error);
    }
  }
}
