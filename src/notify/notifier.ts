import sgMail from "@sendgrid/mail";

export interface EmailAttachment {
  filename: string;
  /** base64 */
  content: string;
  type: string;
}

export interface EmailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
  attachments: EmailAttachment[];
}

// Narrow transport interface so tests can swap in a fake
export interface EmailClient {
  send(message: EmailMessage): Promise<void>;
}

export function createSendGridClient(apiKey: string): EmailClient {
  sgMail.setApiKey(apiKey);
  return {
    async send({ from, to, subject, text, attachments }) {
      await sgMail.send({
        from,
        to,
        subject,
        text,
        attachments: attachments.map(a => ({ ...a, disposition: "attachment" }))
      });
    }
  };
}

export interface NotifyMeta {
  date: string;
  recommendedCount: number;
}

export interface Notifier {
  send(attachmentPaths: string[], meta: NotifyMeta): Promise<void>;
}
