// src/services/emailText.ts
// Turns one uploaded file into the raw event text for the text area.
// .eml -> "Subject\n\nbody" (HTML converted when there is no plain part); anything else -> UTF-8 text.

import { simpleParser, type ParsedMail } from "mailparser";
import { htmlToText } from "html-to-text";
import { ValidationError, errorMessage } from "../lib/errors.js";

export type UploadedFile = {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
};

export function isEmailFile(file: Pick<UploadedFile, "originalname" | "mimetype">): boolean {
  return /\.eml$/i.test(file.originalname) || file.mimetype === "message/rfc822";
}

export async function emailToText(content: string): Promise<string> {
  let mail: ParsedMail;
  try {
    mail = await simpleParser(content);
  } catch (e) {
    throw new ValidationError(`Could not read email: ${errorMessage(e)}`);
  }

  const subject = (mail.subject ?? "").trim();

  // Prefer plain text part. If missing, convert HTML → text.
  let body = (mail.text ?? "").trim();
  if (!body && typeof mail.html === "string") {
    body = htmlToText(mail.html, {
      wordwrap: false,
      selectors: [{ selector: "a", options: { hideLinkHrefIfSameAsText: true } }],
    }).trim();
  }

  return [subject, body].filter(Boolean).join("\n\n");
}

export async function textFromUpload(file: UploadedFile): Promise<string> {
  const content = file.buffer.toString("utf8");
  const text = isEmailFile(file) ? await emailToText(content) : content.trim();
  if (!text) throw new ValidationError(`${file.originalname} contains no text`);
  return text;
}
