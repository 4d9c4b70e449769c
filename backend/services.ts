import type { ReviewConfig } from "./config";
import { createDecisionSessions, type DecisionSessions } from "./decisionSessions";
import { createLogger } from "./logger";
import { createReviewSessions, type ReviewSessions } from "./reviewSessions";
import { createBackend, type Backend } from "./runtime";
import { createMemorySessionStore, type SessionStore } from "./sessionStore";
import type { TagCatalog } from "./tagCatalog";
import type { TraitDirectory } from "./traitDirectory";

export interface ReviewServicesOptions {
  config: ReviewConfig;
  directory: TraitDirectory;
  tags: TagCatalog;
  store?: SessionStore;
  now?: () => Date;
}

export interface ReviewServices {
  backend: Backend;
  store: SessionStore;
  reviewSessions: ReviewSessions;
  decisionSessions: DecisionSessions;
  /** Drops every session the actor holds. */
  logout(actorId: number): Promise<void>;
  reapExpiredSessions(): Promise<number>;
  /** Stops the background sweep of idle sessions. */
  close(): void;
}

export function createReviewServices(options: ReviewServicesOptions): ReviewServices {
  const { config, directory, tags, now } = options;
  const logger = createLogger({ level: config.logLevel });
  const backend = createBackend({ directory, tags, logger, now });
  const idleTimeoutMs = config.sessionIdleMinutes * 60_000;
  const store = options.store ?? createMemorySessionStore({ idleTimeoutMs, now });
  const reviewSessions = createReviewSessions({ backend, store });
  const decisionSessions = createDecisionSessions({ backend, store });

  async function logout(actorId: number): Promise<void> {
    await store.clearActor(actorId);
    logger.info("sessions cleared", { actorId });
  }

  async function reapExpiredSessions(): Promise<number> {
    const reaped = await store.sweep();
    if (reaped > 0) logger.debug("expired sessions reaped", { reaped });
    return reaped;
  }

  const reaper = setInterval(() => {
    reapExpiredSessions().catch((error: unknown) => {
      logger.error("session sweep failed", { error: String(error) });
    });
  }, idleTimeoutMs);
  reaper.unref();

  function close(): void {
    clearInterval(reaper);
  }

  return {
    backend,
    store,
    reviewSessions,
    decisionSessions,
    logout,
    reapExpiredSessions,
    close,
  };
}
