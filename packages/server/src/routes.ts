import express, { Router, type Request, type Response } from 'express';
import { fileURLToPath } from 'url';
import type { InMemoryLibrary, SystemUpdateNotifier } from 'cds-core';
import { handleControlRequest, type ContentDirectoryActions } from './soapHandler';
import { parseCallbackHeader, type EventSubscriptionManager, type Subscription } from './eventSubscriptions';

export const SCPD_PATH = '/upnp/ContentDirectory.xml';
export const CONTROL_PATH = '/upnp/control/ContentDirectory';
export const EVENT_PATH = '/upnp/event/ContentDirectory';

const scpdFile = fileURLToPath(new URL('../assets/ContentDirectory.xml', import.meta.url));

export interface RouteDependencies {
  service: ContentDirectoryActions;
  notifier: SystemUpdateNotifier;
  library: InMemoryLibrary;
  subscriptions: EventSubscriptionManager;
  libraryFile: string;
}

const subscriptionHeaders = (res: Response, subscription: Subscription): Response =>
  res.set({ SID: subscription.sid, TIMEOUT: `Second-${subscription.timeoutSec}` });

export function createRouter(deps: RouteDependencies): Router {
  const router = Router();
  const { service, notifier, library, subscriptions } = deps;

  // SCPD
  router.get(SCPD_PATH, (req: Request, res: Response) => {
    res.type('text/xml').sendFile(scpdFile);
  });

  // SOAP control
  router.post(CONTROL_PATH, express.text({ type: () => true, limit: '1mb' }), async (req: Request, res: Response) => {
    const body = typeof req.body === 'string' ? req.body : '';
    const reply = await handleControlRequest(service, body, req.get('SOAPACTION'));
    res.status(reply.status).type('text/xml').send(reply.xml);
  });

  // GENA: מנוי חדש או חידוש
  router.subscribe(EVENT_PATH, (req: Request, res: Response) => {
    const sid = req.get('SID');
    const callback = req.get('CALLBACK');
    const nt = req.get('NT');

    if (sid) {
      if (callback || nt) {
        res.status(400).end();
        return;
      }
      const renewed = subscriptions.renew(sid, req.get('TIMEOUT'));
      if (!renewed) {
        res.status(412).end();
        return;
      }
      subscriptionHeaders(res, renewed).status(200).end();
      return;
    }

    const callbacks = parseCallbackHeader(callback);
    if (nt !== 'upnp:event' || callbacks.length === 0) {
      res.status(412).end();
      return;
    }

    const subscription = subscriptions.subscribe(callbacks, req.get('TIMEOUT'));
    subscriptionHeaders(res, subscription).status(200).end();
    // האירוע הראשוני נשלח אחרי התשובה ל-SUBSCRIBE
    notifier.subscribe(subscription.sid);
  });

  router.unsubscribe(EVENT_PATH, (req: Request, res: Response) => {
    const sid = req.get('SID');
    if (!sid) {
      res.status(412).end();
      return;
    }
    if (req.get('CALLBACK') || req.get('NT')) {
      res.status(400).end();
      return;
    }
    if (!subscriptions.unsubscribe(sid)) {
      res.status(412).end();
      return;
    }
    notifier.unsubscribe();
    res.status(200).end();
  });

  // Admin routes
  router.get('/api/status', (req: Request, res: Response) => {
    res.json({
      systemUpdateId: notifier.state.systemUpdateId,
      subscribers: notifier.state.subscribers,
      pendingEvent: notifier.pending,
      library: library.stats(),
    });
  });

  router.post('/api/library/rescan', async (req: Request, res: Response) => {
    await library.reloadFromFile(deps.libraryFile);
    res.json({ systemUpdateId: notifier.state.systemUpdateId, library: library.stats() });
  });

  return router;
}
