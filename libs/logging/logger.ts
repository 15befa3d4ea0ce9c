import pino from "pino";
import type { EnvelopeHeader } from "../envelope/types.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "trustmesh"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type Logger = pino.Logger;

/**
 * Returns a child logger with envelope causality attached.
 */
export function getEnvelopeLogger(envelope: EnvelopeHeader): Logger {
  return logger.child({
    messageId: envelope.messageId,
    causalityId: envelope.causalityId,
    messageType: envelope.messageType,
    actorId: envelope.actor.id
  });
}
