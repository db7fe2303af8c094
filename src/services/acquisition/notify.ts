import pino from 'pino';
import type { AcquisitionEvent, Notifier } from './types.js';

const log = pino({ name: 'acquisition-notify' });

/**
 * Deliver one event. A notifier failure is logged and never interrupts the
 * purchase flow that produced the event.
 */
export async function safeNotify(notifier: Notifier, event: AcquisitionEvent): Promise<void> {
  try {
    await notifier.notify(event);
  } catch (err) {
    log.error({ err, event: event.type }, 'Notification delivery failed');
  }
}
