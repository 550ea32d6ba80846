import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import nodemailer, { type SendMailOptions } from "nodemailer";
import { describe, expect, it } from "vitest";
import type { RenderedReport } from "../report/render.js";
import { createEmailDelivery, createFileDelivery, type MailTransport } from "./email.js";

const REPORT: RenderedReport = {
  subject: "Market Intelligence Brief - March 1, 2025",
  html: "<!DOCTYPE html><p>hi</p>",
  text: "hi",
};

describe("createEmailDelivery", () => {
  it("sends one message with html and text bodies", async () => {
    const sent: SendMailOptions[] = [];
    const transport: MailTransport = {
      sendMail: async (mail) => {
        sent.push(mail);
        return { messageId: "<test@example.com>" };
      },
    };
    const deliver = createEmailDelivery({
      transport,
      from: "sender@example.com",
      to: "reader@example.com",
    });
    const result = await deliver(REPORT);
    expect(result).toEqual({ status: "sent", messageId: "<test@example.com>" });
    expect(sent).toEqual([
      {
        from: "sender@example.com",
        to: "reader@example.com",
        subject: "Market Intelligence Brief - March 1, 2025",
        text: "hi",
        html: "<!DOCTYPE html><p>hi</p>",
      },
    ]);
  });

  it("reports transport failures without throwing", async () => {
    const deliver = createEmailDelivery({
      transport: {
        sendMail: async () => {
          throw new Error("Invalid login: 535 authentication failed");
        },
      },
      from: "sender@example.com",
      to: "reader@example.com",
    });
    expect(await deliver(REPORT)).toEqual({
      status: "failed",
      detail: "email delivery failed: Invalid login: 535 authentication failed",
    });
  });

  it("works with a nodemailer transport", async () => {
    const deliver = createEmailDelivery({
      transport: nodemailer.createTransport({ jsonTransport: true }),
      from: "sender@example.com",
      to: "reader@example.com",
    });
    const result = await deliver(REPORT);
    expect(result.status).toBe("sent");
    expect(result.messageId).toMatch(/^<.+@.+>$/);
  });
});

describe("createFileDelivery", () => {
  it("writes the html to disk", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "briefing-out-"));
    const outPath = path.join(dir, "nested", "report.html");
    const result = await createFileDelivery({ outPath })(REPORT);
    expect(result.status).toBe("skipped");
    expect(fs.readFileSync(outPath, "utf8")).toBe(REPORT.html);
  });

  it("writes to stdout for '-'", async () => {
    const chunks: string[] = [];
    await createFileDelivery({ outPath: "-", write: (text) => chunks.push(text) })(REPORT);
    expect(chunks).toEqual([REPORT.html]);
  });
});
