import fs from "node:fs";
import path from "node:path";
import nodemailer, { type SendMailOptions } from "nodemailer";
import type { BriefingEnv } from "../config/types.briefing.js";
import { DeliveryError, describeError } from "../errors.js";
import { createSubsystemLogger } from "../logging/logger.js";
import type { RenderedReport } from "../report/render.js";

export type DeliveryStatus = "sent" | "failed" | "skipped";

export type DeliveryResult = {
  status: DeliveryStatus;
  messageId?: string;
  detail?: string;
};

export type ReportDelivery = (report: RenderedReport) => Promise<DeliveryResult>;

/** The part of a nodemailer transporter used for delivery. */
export type MailTransport = {
  sendMail: (mail: SendMailOptions) => Promise<{ messageId: string }>;
};

const log = createSubsystemLogger("email");

export function createSmtpTransport(
  env: Pick<BriefingEnv, "SMTP_HOST" | "SMTP_PORT" | "SENDER_EMAIL" | "SENDER_PASSWORD">,
): MailTransport {
  return nodemailer.createTransport({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_PORT === 465,
    requireTLS: env.SMTP_PORT !== 465,
    auth: { user: env.SENDER_EMAIL, pass: env.SENDER_PASSWORD },
  });
}

/**
 * Sends the report as one HTML message with a text alternative. Failures are
 * logged and returned as a "failed" result; nothing is retried.
 */
export function createEmailDelivery(params: {
  transport: MailTransport;
  from: string;
  to: string;
}): ReportDelivery {
  return async (report) => {
    log.info(`sending report to ${params.to}`);
    try {
      const info = await params.transport.sendMail({
        from: params.from,
        to: params.to,
        subject: report.subject,
        text: report.text,
        html: report.html,
      });
      log.info(`email sent (${info.messageId})`);
      return { status: "sent", messageId: info.messageId };
    } catch (err) {
      const error = new DeliveryError(`email delivery failed: ${describeError(err)}`, {
        cause: err,
      });
      log.error(error.message);
      return { status: "failed", detail: error.message };
    }
  };
}

/** Writes the HTML to a file (or stdout for "-") instead of sending it. */
export function createFileDelivery(params: {
  outPath: string;
  write?: (text: string) => void;
}): ReportDelivery {
  return async (report) => {
    if (params.outPath === "-") {
      (params.write ?? ((text: string) => process.stdout.write(text)))(report.html);
      return { status: "skipped", detail: "dry run: report written to stdout" };
    }
    try {
      await fs.promises.mkdir(path.dirname(params.outPath), { recursive: true });
      await fs.promises.writeFile(params.outPath, report.html, "utf8");
    } catch (err) {
      const error = new DeliveryError(`cannot write report: ${describeError(err)}`, { cause: err });
      log.error(error.message);
      return { status: "failed", detail: error.message };
    }
    log.info(`dry run: report written to ${params.outPath}`);
    return { status: "skipped", detail: `dry run: report written to ${params.outPath}` };
  };
}
