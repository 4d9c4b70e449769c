import type { Actor } from "./capabilities";
import { addDccReview } from "./dccReviews";
import { ConflictError } from "./errors";
import { createLogger } from "./logger";
import { createBackend, type ActorClient } from "./runtime";
import { createMemorySessionStore } from "./sessionStore";
import { addStudyResponse } from "./studyResponses";
import { createMemoryTagCatalog } from "./tagCatalog";
import { createTaggedVariable } from "./taggedVariables";
import { createMemoryTraitDirectory } from "./traitDirectory";
import traitDirectoryData from "./fixtures/traitDirectory.json";

export const STUDY = {
  lungHealth: 1001,
  heartOffspring: 1002,
} as const;

export const actors = {
  dcc: { id: 1, name: "dcc-analyst", roles: ["dcc_analysts"], taggableStudyIds: [] },
  tagger: {
    id: 2,
    name: "lung-tagger",
    roles: ["phenotype_taggers"],
    taggableStudyIds: [STUDY.lungHealth],
  },
  otherTagger: {
    id: 3,
    name: "heart-tagger",
    roles: ["phenotype_taggers"],
    taggableStudyIds: [STUDY.heartOffspring],
  },
  dcc2: { id: 4, name: "dcc-developer", roles: ["dcc_developers"], taggableStudyIds: [] },
  visitor: { id: 5, name: "visitor", roles: [], taggableStudyIds: [STUDY.lungHealth] },
} satisfies Record<string, Actor>;

export const SESSION_IDLE_MS = 30 * 60_000;

export function createClock(start = "2024-03-01T12:00:00.000Z") {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advanceMinutes(minutes: number) {
      current += minutes * 60_000;
    },
  };
}

export function createTestBackend() {
  const clock = createClock();
  const tags = createMemoryTagCatalog();
  const asthma = tags.addTag({
    title: "Asthma status",
    description: "Doctor-diagnosed asthma",
    creatorId: actors.dcc.id,
  });
  const smoking = tags.addTag({
    title: "Smoking status",
    description: "Current or former cigarette smoking",
    creatorId: actors.dcc.id,
  });
  const bloodPressure = tags.addTag({
    title: "Blood pressure",
    description: "Resting systolic or diastolic blood pressure",
    creatorId: actors.dcc.id,
  });

  const directory = createMemoryTraitDirectory(traitDirectoryData);
  const backend = createBackend({
    directory,
    tags,
    logger: createLogger({ level: "silent" }),
    now: clock.now,
  });
  const store = createMemorySessionStore({ idleTimeoutMs: SESSION_IDLE_MS, now: clock.now });

  return {
    backend,
    store,
    clock,
    tags,
    directory,
    tagIds: { asthma: asthma.id, smoking: smoking.id, bloodPressure: bloodPressure.id },
    as: (actor: Actor): ActorClient => backend.withIdentity(actor),
  };
}

export type TestBackend = ReturnType<typeof createTestBackend>;

export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected the promise to reject");
}

/** "ok" for a call that went through, else the conflict reason or error name. */
export function outcomesOf(results: PromiseSettledResult<unknown>[]): string[] {
  return results.map((result) => {
    if (result.status === "fulfilled") return "ok";
    const error: unknown = result.reason;
    if (error instanceof ConflictError) return error.reason;
    return error instanceof Error ? error.name : String(error);
  });
}

export async function tagVariable(t: TestBackend, variableId: number, tagId: number) {
  return await t.as(actors.tagger).mutation(createTaggedVariable, { variableId, tagId });
}

/** Tags a variable, flags it and has the study disagree. */
export async function createDisagreement(
  t: TestBackend,
  variableId: number,
  tagId: number,
) {
  const taggedVariable = await tagVariable(t, variableId, tagId);
  const review = await t.as(actors.dcc).mutation(addDccReview, {
    taggedVariableId: taggedVariable._id,
    status: "flagged",
    comment: "wrong phenotype",
  });
  const response = await t.as(actors.tagger).mutation(addStudyResponse, {
    dccReviewId: review._id,
    status: "disagree",
    comment: "still relevant",
  });
  return { taggedVariable, review, response };
}
