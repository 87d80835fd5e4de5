import type { Response } from "express";
import type { ZodError } from "zod";
import type { ErrorKind, Failure, Outcome } from "../types";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation: 400,
  image_read: 422,
  provider: 502,
  store: 503,
  internal: 500,
};

export function sendFailure(res: Response, failure: Failure, context: string): void {
  console.error(`${context} failed (${failure.kind}): ${failure.message}`);
  res.status(STATUS_BY_KIND[failure.kind]).json({ ok: false, kind: failure.kind, error: failure.message });
}

export function sendInvalid(res: Response, error: ZodError): void {
  const message = error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
  res.status(400).json({ ok: false, kind: "validation", error: message });
}

export function sendOutcome<T>(
  res: Response,
  outcome: Outcome<T>,
  context: string,
  render: (value: T) => Record<string, unknown>
): void {
  if (!outcome.ok) {
    sendFailure(res, outcome, context);
    return;
  }
  res.json({ ok: true, ...render(outcome.value) });
}
