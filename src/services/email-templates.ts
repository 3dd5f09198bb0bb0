import { formatInTimezone } from './timezone.js';

export interface EmailMessage {
  subject: string;
  body: string;
}

export function escapeHtml(value: string): string {
  const map: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    '\'': '&#39;',
  };
  return value.replace(/[&<>"']/g, (ch) => map[ch] ?? ch);
}

export function sanitizeEmailSubject(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').trim();
}

function layout(headline: string, content: string): string {
  return `<!DOCTYPE html>
<html>
  <body style="font-family: Arial, sans-serif; line-height: 1.6; color: #333;">
    <h2 style="color: #4CAF50;">${escapeHtml(headline)}</h2>
    ${content}
    <hr style="border: none; border-top: 1px solid #ddd; margin: 20px 0;">
    <small style="color: #888;">Sent by your task reminder service.</small>
  </body>
</html>`;
}

export interface ReminderEmailInput {
  title: string;
  description: string | null;
  status: string;
  dueDate: Date | null;
  timezone: string;
}

export function reminderEmail(task: ReminderEmailInput): EmailMessage {
  const due = task.dueDate ? formatInTimezone(task.dueDate, task.timezone) : 'No due date';

  return {
    subject: sanitizeEmailSubject(`Reminder: ${task.title}`),
    body: layout(
      'Task Reminder',
      `<p>This is a friendly reminder about your task:</p>
    <div style="border: 1px solid #ddd; padding: 20px; margin: 15px 0; border-radius: 8px; background-color: #f9f9f9;">
      <h3 style="margin: 0;">${escapeHtml(task.title)}</h3>
      <p style="margin: 5px 0;"><strong>Description:</strong> ${escapeHtml(task.description ?? 'No description')}</p>
      <p style="margin: 5px 0;"><strong>Status:</strong> ${escapeHtml(task.status)}</p>
      <p style="margin: 5px 0;"><strong>Due Date:</strong> ${escapeHtml(due)}</p>
    </div>`,
    ),
  };
}

export function otpEmail(code: string, ttlMinutes: number): EmailMessage {
  return {
    subject: 'Your Verification Code',
    body: layout(
      'Verification Code',
      `<p>Please use the following verification code to confirm your email address:</p>
    <div style="font-size: 28px; color: #007bff; font-weight: bold; letter-spacing: 2px; margin: 20px 0;">${escapeHtml(code)}</div>
    <p>This code will expire in <b>${ttlMinutes} minutes</b>. If you did not request this, please ignore this email.</p>`,
    ),
  };
}

export function resetPasswordEmail(resetLink: string, ttlMinutes: number): EmailMessage {
  return {
    subject: 'Password Reset Request',
    body: layout(
      'Password Reset',
      `<p>Click the link below to reset your password:</p>
    <p><a href="${escapeHtml(resetLink)}">${escapeHtml(resetLink)}</a></p>
    <p>The link expires in <b>${ttlMinutes} minutes</b> and can be used once.</p>`,
    ),
  };
}
