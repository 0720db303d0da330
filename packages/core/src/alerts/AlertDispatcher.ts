import { setTimeout as sleep } from 'node:timers/promises';
import { createTransport } from 'nodemailer';
import {
  AlertDeliveryError,
  MailNotConfiguredError,
  errorMessage,
  getLogger,
  parseDuration,
} from '@fleetwatch/shared';
import type { HostResult, ValidatedSmtpConfig } from '@fleetwatch/shared';

import { collectAlerts, formatAlertBody } from './AlertReport.js';

export interface AlertMail {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/**
 * The part of a nodemailer transporter the dispatcher uses.
 */
export interface MailTransport {
  sendMail(mail: AlertMail): Promise<unknown>;
}

export interface DispatchResult {
  sent: boolean;
  alerts: HostResult[];
  body: string;
  attempts: number;
}

export function createMailTransport(smtp: ValidatedSmtpConfig): MailTransport {
  return createTransport({
    host: smtp.server,
    port: smtp.port,
    secure: smtp.secure,
    auth: smtp.auth,
  });
}

/**
 * Mail one summary of every alerting host. Nothing is sent when no host is
 * alerting. Submission is retried `smtp.retries` times before giving up with
 * an AlertDeliveryError.
 */
export async function dispatchAlerts(
  results: readonly HostResult[],
  smtp: ValidatedSmtpConfig | undefined,
  transport?: MailTransport,
): Promise<DispatchResult> {
  const alerts = collectAlerts(results);
  if (alerts.length === 0) {
    return { sent: false, alerts, body: '', attempts: 0 };
  }
  if (!smtp) {
    throw new MailNotConfiguredError();
  }

  const logger = getLogger();
  const mailer = transport ?? createMailTransport(smtp);
  const body = formatAlertBody(alerts);
  const mail: AlertMail = { from: smtp.from, to: smtp.to, subject: smtp.subject, text: body };
  const maxAttempts = smtp.retries + 1;
  const retryDelay = parseDuration(smtp.retryDelay);

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await mailer.sendMail(mail);
      logger.info({ to: smtp.to, alerts: alerts.length, attempt }, 'Alert mail sent');
      return { sent: true, alerts, body, attempts: attempt };
    } catch (err) {
      lastError = err;
      logger.warn({ err, attempt, maxAttempts, server: smtp.server }, 'Alert mail submission failed');
      if (attempt < maxAttempts && retryDelay > 0) {
        await sleep(retryDelay);
      }
    }
  }

  throw new AlertDeliveryError(errorMessage(lastError), maxAttempts);
}
