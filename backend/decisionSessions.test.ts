import { describe, expect, test } from "vitest";
import { addDccDecision } from "./dccDecisions";
import { NotFoundError, PermissionError } from "./errors";
import { createDecisionSessions } from "./decisionSessions";
import { createReviewSessions } from "./reviewSessions";
import { getReviewStatus } from "./reviewStatus";
import {
  STUDY,
  actors,
  createDisagreement,
  createTestBackend,
  rejectionOf,
  tagVariable,
} from "./test_helpers";

function setup() {
  const t = createTestBackend();
  const decisions = createDecisionSessions({ backend: t.backend, store: t.store });
  const filter = { tagId: t.tagIds.asthma, studyId: STUDY.lungHealth };
  return { t, decisions, filter };
}

describe("decisionSessions", () => {
  test("decides each disputed tag in turn", async () => {
    const { t, decisions, filter } = setup();
    await createDisagreement(t, 2, t.tagIds.asthma);
    await createDisagreement(t, 3, t.tagIds.asthma);

    const view = await decisions.startSession(actors.dcc, filter);
    expect(view).toMatchObject({ kind: "item", position: 1, total: 2 });
    expect(view.kind === "item" && view.status.needs).toBe("dcc_decision");

    const first = await decisions.submitDecision(actors.dcc, {
      taggedVariableId: 1,
      decision: "remove",
      comment: "not asthma",
    });
    expect(first).toMatchObject({
      kind: "submitted",
      taggedVariableId: 1,
      next: { kind: "item", position: 2 },
    });
    const second = await decisions.submitDecision(actors.dcc, {
      taggedVariableId: 2,
      decision: "confirm",
      comment: "keep",
    });
    expect(second.next).toEqual({ kind: "complete", skipped: [] });

    const removed = await t.as(actors.dcc).query(getReviewStatus, { taggedVariableId: 1 });
    const kept = await t.as(actors.dcc).query(getReviewStatus, { taggedVariableId: 2 });
    expect(removed?.archived).toBe(true);
    expect(kept).toMatchObject({ archived: false, resolved: true, decision: "confirm" });
  });

  test("skips a tag another curator already decided", async () => {
    const { t, decisions, filter } = setup();
    const first = await createDisagreement(t, 2, t.tagIds.asthma);
    const second = await createDisagreement(t, 3, t.tagIds.asthma);
    await decisions.startSession(actors.dcc, filter);

    await t.as(actors.dcc2).mutation(addDccDecision, {
      dccReviewId: first.review._id,
      decision: "confirm",
      comment: "keep",
    });
    const outcome = await decisions.submitDecision(actors.dcc, {
      taggedVariableId: first.taggedVariable._id,
      decision: "remove",
      comment: "not asthma",
    });

    expect(outcome).toMatchObject({ kind: "skipped", reason: "superseded" });
    expect(outcome.next.kind === "item" && outcome.next.taggedVariable._id).toBe(
      second.taggedVariable._id,
    );
  });

  test("reports an archived tag as skipped", async () => {
    const { t, decisions, filter } = setup();
    const first = await createDisagreement(t, 2, t.tagIds.asthma);
    await decisions.startSession(actors.dcc, filter);

    await t.as(actors.dcc2).mutation(addDccDecision, {
      dccReviewId: first.review._id,
      decision: "remove",
      comment: "not asthma",
    });
    const outcome = await decisions.submitDecision(actors.dcc, {
      taggedVariableId: first.taggedVariable._id,
      decision: "confirm",
      comment: "keep",
    });

    expect(outcome).toEqual({
      kind: "skipped",
      taggedVariableId: first.taggedVariable._id,
      reason: "archived",
      next: { kind: "complete", skipped: [] },
    });
  });

  test("runs beside a review session without sharing a cursor", async () => {
    const { t, decisions, filter } = setup();
    const reviews = createReviewSessions({ backend: t.backend, store: t.store });
    await createDisagreement(t, 2, t.tagIds.asthma);
    const unreviewed = await tagVariable(t, 4, t.tagIds.smoking);

    await decisions.startSession(actors.dcc, filter);
    await reviews.startSession(actors.dcc, {
      tagId: t.tagIds.smoking,
      studyId: STUDY.lungHealth,
    });
    expect(await reviews.advance(actors.dcc)).toEqual({ kind: "complete", skipped: [] });

    const decisionView = await decisions.current(actors.dcc);
    expect(decisionView.kind === "item" && decisionView.taggedVariable._id).toBe(1);
    expect(await reviews.current(actors.dcc)).toEqual({ kind: "none" });
    expect(unreviewed._id).toBe(2);
  });

  test("fails to start without disputed tags", async () => {
    const { t, decisions, filter } = setup();
    await tagVariable(t, 2, t.tagIds.asthma);

    const error = await rejectionOf(decisions.startSession(actors.dcc, filter));

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toHaveProperty("resource", "decision candidates");
  });

  test("only DCC deciders start decision sessions", async () => {
    const { t, decisions, filter } = setup();
    await createDisagreement(t, 2, t.tagIds.asthma);

    await expect(decisions.startSession(actors.tagger, filter)).rejects.toThrow(
      PermissionError,
    );
  });
});
