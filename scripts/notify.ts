import { createTransport, type SendMailOptions } from 'nodemailer';
import type { Logger } from 'pino';
import { AuthenticationError, DeliveryError, errorMessage } from './errors';
import { silentLogger } from './logger';
import type { EmailCredential, RenderedMessage } from './types';

const GMAIL_HOST = 'smtp.gmail.com';
const GMAIL_PORT = 465;

const AUTH_ERROR_CODES = new Set(['EAUTH', 'ENOAUTH']);
const AUTH_RESPONSE_CODES = new Set([534, 535]);

/** The part of a nodemailer transporter the notifier needs. */
export interface MailTransport {
  verify(): Promise<unknown>;
  sendMail(options: SendMailOptions): Promise<{ messageId: string; rejected?: unknown[] }>;
  close(): void;
}

export type MailTransportFactory = (credential: { user: string; pass: string }) => MailTransport;

export interface DeliveryReceipt {
  messageId: string;
  recipients: string[];
}

export interface Notifier {
  send(message: RenderedMessage): Promise<DeliveryReceipt>;
}

export interface EmailNotifierOptions {
  credential: EmailCredential;
  /** Defaults to the sender's own address. */
  recipients?: string[];
  transport?: MailTransportFactory;
  logger?: Logger;
}

export const gmailTransport: MailTransportFactory = auth =>
  createTransport({
    host: GMAIL_HOST,
    port: GMAIL_PORT,
    secure: true,
    auth,
  });

export function senderAddress(username: string): string {
  return username.includes('@') ? username : `${username}@gmail.com`;
}

function isAuthFailure(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const code = 'code' in error ? error.code : undefined;
  const responseCode = 'responseCode' in error ? error.responseCode : undefined;
  return (typeof code === 'string' && AUTH_ERROR_CODES.has(code))
    || (typeof responseCode === 'number' && AUTH_RESPONSE_CODES.has(responseCode));
}

function toNotifyError(error: unknown, user: string): AuthenticationError | DeliveryError {
  if (isAuthFailure(error)) {
    return new AuthenticationError(`Mail server rejected the credentials for ${user}`, { cause: error });
  }
  return new DeliveryError(`Could not deliver mail: ${errorMessage(error)}`, { cause: error });
}

/**
 * Sends rendered reports through an authenticated SMTP transport.
 * The connection is verified before anything is submitted, so rejected
 * credentials never lead to a partial send.
 */
export class EmailNotifier implements Notifier {
  private readonly user: string;
  private readonly recipients: string[];
  private readonly logger: Logger;

  constructor(private readonly options: EmailNotifierOptions) {
    this.user = senderAddress(options.credential.username.trim());
    this.recipients = options.recipients?.length ? options.recipients : [this.user];
    this.logger = options.logger ?? silentLogger;
  }

  async send(message: RenderedMessage): Promise<DeliveryReceipt> {
    const { username, appPassword } = this.options.credential;
    if (!username.trim() || !appPassword) {
      throw new AuthenticationError('Mail username and app password are required');
    }

    const transport = (this.options.transport ?? gmailTransport)({ user: this.user, pass: appPassword });

    try {
      await transport.verify();
      this.logger.debug({ user: this.user }, 'Mail transport verified');

      const info = await transport.sendMail({
        from: this.user,
        to: this.recipients,
        subject: message.subject,
        text: message.text,
        ...(message.html ? { html: message.html } : {}),
      });

      if (info.rejected && info.rejected.length > 0) {
        throw new DeliveryError(`Mail server refused ${info.rejected.length} recipient(s)`);
      }

      this.logger.info({ messageId: info.messageId, recipients: this.recipients.length }, 'Report sent');
      return { messageId: info.messageId, recipients: [...this.recipients] };
    } catch (error) {
      if (error instanceof DeliveryError) throw error;
      throw toNotifyError(error, this.user);
    } finally {
      transport.close();
    }
  }
}
