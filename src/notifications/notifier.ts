import type { Logger } from "../config/logger";

export type NotificationPayload = {
  question: string;
  agent: string | null;
  url: string;
};

export type FormattedNotification = {
  title: string;
  body: string;
  url: string;
};

/** Renders "an agent needs input" wherever a human will see it. */
export interface Notifier {
  notify(payload: NotificationPayload): void | Promise<void>;
}

const MAX_BODY_LENGTH = 120;

// Word characters, whitespace and a little punctuation; everything a shell or toast template could interpret is dropped.
export function sanitizeNotificationText(value: string): string {
  return value.replace(/[^\w\s\-.,?:() ]/g, "");
}

export function formatNotification(payload: NotificationPayload): FormattedNotification {
  const title = payload.agent ? `nudge: ${sanitizeNotificationText(payload.agent)}` : "nudge";
  let body = sanitizeNotificationText(payload.question);
  if (body.length > MAX_BODY_LENGTH) {
    body = `${body.slice(0, MAX_BODY_LENGTH - 3)}...`;
  }
  return { title, body, url: payload.url };
}

export function createLogNotifier(logger: Logger): Notifier {
  return {
    notify(payload) {
      logger.info("nudge_broker_notification", { ...formatNotification(payload) });
    },
  };
}
