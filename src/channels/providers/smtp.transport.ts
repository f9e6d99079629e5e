import nodemailer from "nodemailer";

import type { EmailTransport } from "@/channels/providers/types";

export interface SmtpTransportConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
}

export function createSmtpTransport(cfg: SmtpTransportConfig): EmailTransport {
  const transporter = nodemailer.createTransport({
    host: cfg.host,
    port: cfg.port,
    secure: cfg.secure,
    auth: cfg.user ? { user: cfg.user, pass: cfg.pass } : undefined,
  });

  return {
    async send(message) {
      const info = await transporter.sendMail({
        from: message.from,
        to: message.to.join(", "),
        subject: message.subject,
        html: message.html,
      });

      return { messageId: info.messageId || null };
    },
  };
}
