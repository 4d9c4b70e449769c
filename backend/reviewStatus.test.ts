import { describe, expect, test } from "vitest";
import { addDccReview } from "./dccReviews";
import {
  countDecisionCandidates,
  countReviewCandidates,
  getReviewStatus,
  getStudyTagCounts,
  listReviewCandidateIds,
} from "./reviewStatus";
import { addStudyResponse } from "./studyResponses";
import { createTaggedVariablesBulk } from "./taggedVariables";
import {
  STUDY,
  actors,
  createDisagreement,
  createTestBackend,
  tagVariable,
} from "./test_helpers";

describe("reviewStatus", () => {
  describe("getReviewStatus", () => {
    test("returns null for unknown tagged variables", async () => {
      const t = createTestBackend();

      expect(
        await t.as(actors.dcc).query(getReviewStatus, { taggedVariableId: 8 }),
      ).toBeNull();
    });

    test("follows a tag through the review pipeline", async () => {
      const t = createTestBackend();
      const tv = await tagVariable(t, 2, t.tagIds.asthma);
      const read = async () =>
        await t.as(actors.dcc).query(getReviewStatus, { taggedVariableId: tv._id });

      expect(await read()).toMatchObject({
        state: "unreviewed",
        needs: "dcc_review",
        resolved: false,
        dccReviewId: null,
      });

      const review = await t.as(actors.dcc).mutation(addDccReview, {
        taggedVariableId: tv._id,
        status: "flagged",
        comment: "wrong phenotype",
      });
      expect(await read()).toMatchObject({
        state: "awaiting_response",
        needs: "study_response",
        resolved: false,
        dccReviewId: review._id,
      });

      await t.as(actors.tagger).mutation(addStudyResponse, {
        dccReviewId: review._id,
        status: "disagree",
        comment: "still relevant",
      });
      expect(await read()).toMatchObject({
        state: "awaiting_decision",
        needs: "dcc_decision",
        resolved: false,
        decision: null,
      });
    });
  });

  describe("candidate counts", () => {
    test("count unreviewed and disputed tags per tag and study", async () => {
      const t = createTestBackend();
      await t.as(actors.tagger).mutation(createTaggedVariablesBulk, {
        variableIds: [3, 4, 5, 6],
        tagId: t.tagIds.asthma,
      });
      await createDisagreement(t, 2, t.tagIds.asthma);
      await t.as(actors.dcc).mutation(addDccReview, {
        taggedVariableId: 2,
        status: "confirmed",
      });
      const filter = { tagId: t.tagIds.asthma, studyId: STUDY.lungHealth };
      const client = t.as(actors.dcc);

      expect(await client.query(countReviewCandidates, filter)).toBe(3);
      expect(await client.query(listReviewCandidateIds, filter)).toEqual([1, 3, 4]);
      expect(await client.query(countDecisionCandidates, filter)).toBe(1);
      expect(
        await client.query(countReviewCandidates, {
          tagId: t.tagIds.smoking,
          studyId: STUDY.lungHealth,
        }),
      ).toBe(0);
    });
  });

  describe("getStudyTagCounts", () => {
    test("splits counts by archived flag", async () => {
      const t = createTestBackend();
      await tagVariable(t, 2, t.tagIds.asthma);
      await tagVariable(t, 2, t.tagIds.smoking);
      const archived = await tagVariable(t, 3, t.tagIds.asthma);
      const review = await t.as(actors.dcc).mutation(addDccReview, {
        taggedVariableId: archived._id,
        status: "flagged",
        comment: "wrong phenotype",
      });
      await t.as(actors.tagger).mutation(addStudyResponse, {
        dccReviewId: review._id,
        status: "agree",
      });

      const counts = await t
        .as(actors.visitor)
        .query(getStudyTagCounts, { studyId: STUDY.lungHealth });

      expect(counts).toEqual({
        studyId: STUDY.lungHealth,
        active: { taggedVariables: 2, variables: 1, tags: 2 },
        archived: { taggedVariables: 1, variables: 1, tags: 1 },
      });
    });
  });
});
