import type { ZodError } from "zod";

/** A pipeline payload failed boundary validation. */
export class MalformedInputError extends Error {
  readonly issues: string[];

  constructor(what: string, error: ZodError) {
    super(`Malformed ${what}`);
    this.name = "MalformedInputError";
    this.issues = error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
  }
}

export class CredentialUnavailableError extends Error {
  constructor(readonly credential: string) {
    super(`Credential unavailable: ${credential}`);
    this.name = "CredentialUnavailableError";
  }
}

/** Network, timeout or provider failure of the text-completion capability. */
export class ModelCallError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelCallError";
  }
}
