/**
 * SMTP delivery for the tender digest
 */

import { createTransport, type Transporter } from 'nodemailer'
import type SMTPTransport from 'nodemailer/lib/smtp-transport'
import type { SmtpSettings } from '../config'

export interface DigestMailer {
  send(subject: string, html: string): Promise<void>
}

export interface MailSettings {
  from: string
  to: string
  smtp: SmtpSettings
}

/**
 * 465 speaks TLS from the first byte; anything else connects in plain text
 * and must upgrade with STARTTLS before credentials are sent.
 */
export function smtpTransportOptions(smtp: SmtpSettings): SMTPTransport.Options {
  const implicitTls = smtp.port === 465
  return {
    host: smtp.host,
    port: smtp.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: smtp.user ? { user: smtp.user, pass: smtp.password ?? '' } : undefined,
  }
}

export class SmtpDigestMailer implements DigestMailer {
  private readonly transport: Pick<Transporter, 'sendMail'>

  constructor(
    private readonly settings: MailSettings,
    transport?: Pick<Transporter, 'sendMail'>
  ) {
    this.transport = transport ?? createTransport(smtpTransportOptions(settings.smtp))
  }

  async send(subject: string, html: string): Promise<void> {
    console.log(`[Mailer] Sending email from ${this.settings.from} to ${this.settings.to}...`)
    const info = await this.transport.sendMail({
      from: this.settings.from,
      to: this.settings.to,
      subject,
      html,
    })
    console.log(`[Mailer] Email sent successfully (${String(info.messageId)})`)
  }
}
