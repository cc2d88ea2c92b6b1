/**
 * Broadcast committed protocol events to Redis so other services can follow resolutions.
 * Payloads are JSON with bigint amounts as decimal strings.
 */

import { REDIS_CHANNELS } from "../config/index.js";
import type { ProtocolEventListener } from "../engine/index.js";
import type { ProtocolLogger } from "../types/collaborators.js";
import type { ProtocolEvent } from "../types/resolution.js";

/** The slice of an ioredis client the sink needs. */
export interface EventPublisher {
  publish(channel: string, message: string): Promise<unknown>;
}

export function serializeProtocolEvent(event: ProtocolEvent): string {
  return JSON.stringify(event, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value));
}

export function createRedisEventSink(publisher: EventPublisher, log: ProtocolLogger): ProtocolEventListener {
  return (event) => {
    publisher.publish(REDIS_CHANNELS.RESOLUTION_EVENTS, serializeProtocolEvent(event)).catch((err: unknown) => {
      log.warn({ err, type: event.type }, "Protocol event broadcast failed");
    });
  };
}
