export class UnknownUserError extends Error {
  constructor(readonly userId: string) {
    super(`User '${userId}' does not exist`);
    this.name = "UnknownUserError";
  }
}

// User-facing replies carry no error detail; the trace keeps it.
export const ACCOUNT_NOT_FOUND_REPLY = "I couldn't find your account. Please check your user ID and try again.";

export const INVALID_PLAN_REPLY = "I couldn't work out how to help with that. Could you rephrase your request?";

export const UPSTREAM_FAILURE_REPLY = "Sorry, something went wrong on my side while handling your request. Please try again in a moment.";
