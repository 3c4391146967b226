// backend/services/shared/http/errors.ts
import type { Response } from "express";

/** Body for expected client-side failures (400/404): `{ "Message": text }`. */
export type MessageBody = { Message: string };

export const messageBody = (message: string): MessageBody => ({
  Message: message,
});

export const notFound = (res: Response, message: string) =>
  res.status(404).json(messageBody(message));

/** Normalize anything thrown into an Error, keeping its message. */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  if (typeof err === "string") return new Error(err);
  return new Error(`Non-error thrown: ${String(err)}`);
}
