export type CampaignErrorCode =
  | "duplicate_contact"
  | "invalid_contact"
  | "invalid_drip_transition"
  | "content_generation_failed"
  | "missing_config";

export class DuplicateContactError extends Error {
  readonly code = "duplicate_contact" satisfies CampaignErrorCode;
  email: string;

  constructor(email: string) {
    super(`Contact already exists: ${email}`);
    this.name = "DuplicateContactError";
    this.email = email;
  }
}

export class InvalidDripTransitionError extends Error {
  readonly code = "invalid_drip_transition" satisfies CampaignErrorCode;
  from: string;
  event: string;

  constructor(from: string, event: string) {
    super(`Invalid drip transition: ${event} from ${from}`);
    this.name = "InvalidDripTransitionError";
    this.from = from;
    this.event = event;
  }
}

export class ContentGenerationError extends Error {
  readonly code = "content_generation_failed" satisfies CampaignErrorCode;
  stage: string;

  constructor(stage: string, message: string) {
    super(`Content generation failed for ${stage}: ${message}`);
    this.name = "ContentGenerationError";
    this.stage = stage;
  }
}

export class MissingConfigError extends Error {
  readonly code = "missing_config" satisfies CampaignErrorCode;

  constructor(key: string) {
    super(`Missing required configuration: ${key}`);
    this.name = "MissingConfigError";
  }
}

export function isDuplicateContactError(error: unknown): error is DuplicateContactError {
  return error instanceof DuplicateContactError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  try {
    return typeof error === "string" ? error : JSON.stringify(error);
  } catch {
    return String(error);
  }
}
