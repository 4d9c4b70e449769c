import { Actor } from "./capabilities";
import { createDatabase, type Database } from "./db";
import { decodeOrThrow } from "./decode";
import type { RegisteredMutation, RegisteredQuery } from "./functions";
import { createLogger, type Logger } from "./logger";
import type { TagCatalog } from "./tagCatalog";
import type { TraitDirectory } from "./traitDirectory";

export interface BackendOptions {
  directory: TraitDirectory;
  tags: TagCatalog;
  database?: Database;
  logger?: Logger;
  now?: () => Date;
}

function errorTag(error: unknown): string {
  if (typeof error === "object" && error !== null && "_tag" in error) {
    return String(error._tag);
  }
  return error instanceof Error ? error.name : "UnknownError";
}

export function createBackend(options: BackendOptions) {
  const now = options.now ?? (() => new Date());
  const database = options.database ?? createDatabase({ now });
  const logger = options.logger ?? createLogger();
  const { directory, tags } = options;

  function withIdentity(rawActor: Actor) {
    const actor = decodeOrThrow("actor", Actor, rawActor);

    async function query<Args, Encoded, Result>(
      fn: RegisteredQuery<Args, Encoded, Result>,
      args: NoInfer<Encoded>,
    ): Promise<Result> {
      const decoded = decodeOrThrow(fn.name, fn.args, args);
      return await fn.handler(
        { db: database.reader, actor, directory, tags },
        decoded,
      );
    }

    async function mutation<Args, Encoded, Result>(
      fn: RegisteredMutation<Args, Encoded, Result>,
      args: NoInfer<Encoded>,
    ): Promise<Result> {
      try {
        const decoded = decodeOrThrow(fn.name, fn.args, args);
        const result = await database.transaction((db) =>
          fn.handler({ db, actor, directory, tags, now }, decoded),
        );
        logger.info(`${fn.name} committed`, { actorId: actor.id });
        return result;
      } catch (error) {
        logger.warn(`${fn.name} rejected`, {
          actorId: actor.id,
          error: errorTag(error),
        });
        throw error;
      }
    }

    return { actor, query, mutation };
  }

  return { database, logger, now, withIdentity };
}

export type Backend = ReturnType<typeof createBackend>;
export type ActorClient = ReturnType<Backend["withIdentity"]>;
