import nodemailer, { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { escapeHtml } from './reportTemplate';

let transporter: Transporter<SMTPTransport.SentMessageInfo> | null = null;

const getTransporter = (): Transporter<SMTPTransport.SentMessageInfo> => {
  if (!transporter) {
    transporter = nodemailer.createTransport({
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      secure: env.SMTP_PORT === 465,
      ...(env.SMTP_USER && env.SMTP_PASS
        ? { auth: { user: env.SMTP_USER, pass: env.SMTP_PASS } }
        : {})
    });
  }
  return transporter;
};

export interface EmailAttachment {
  filename: string;
  content: Buffer;
  contentType: string;
}

export interface SendEmailOptions {
  to?: string;
  bcc?: string[];
  subject: string;
  html: string;
  text?: string;
  attachments?: EmailAttachment[];
}

export const sendEmail = async ({ to, bcc, subject, html, text, attachments }: SendEmailOptions) => {
  try {
    const result = await getTransporter().sendMail({
      from: env.EMAIL_FROM,
      to: to || env.EMAIL_FROM,
      bcc,
      subject,
      html,
      text: text || html.replace(/<[^>]*>/g, ''),
      attachments
    });

    logger.info('Email sent', { subject, messageId: result.messageId, bccCount: bcc?.length ?? 0 });
    return result;
  } catch (error) {
    logger.error('Email sending failed', { subject, error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
};

export const sendPasswordResetEmail = async (email: string, otp: string, userName: string) => {
  const html = `
    <h2>Password Reset Request</h2>
    <p>Hello ${escapeHtml(userName)},</p>
    <p>Use the One-Time Passcode (OTP) below to reset your ${env.COMPANY_NAME} password:</p>
    <div style="font-size: 24px; letter-spacing: 4px; font-weight: bold; margin: 16px 0;">${otp}</div>
    <p>This code will expire in 10 minutes.</p>
    <p>If you didn't request this, you can ignore this email.</p>
  `;

  return sendEmail({
    to: email,
    subject: `${env.COMPANY_NAME} – Password Reset OTP`,
    html
  });
};
