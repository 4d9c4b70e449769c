import { Schema } from "effect";
import { PermissionError } from "./errors";
import { EntityId } from "./schema";
import { formatStudyAccession } from "./traitDirectory";

export const Role = Schema.Literal(
  "phenotype_taggers",
  "dcc_analysts",
  "dcc_developers",
);
export type Role = typeof Role.Type;

export const Actor = Schema.Struct({
  id: EntityId,
  name: Schema.String,
  roles: Schema.Array(Role),
  // Studies the actor tags for and responds on behalf of.
  taggableStudyIds: Schema.Array(EntityId),
});
export type Actor = typeof Actor.Type;

export const Capability = {
  Tag: "tag",
  DccReview: "dcc_review",
  StudyRespond: "study_respond",
  DccDecide: "dcc_decide",
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];

const DCC_ROLES: ReadonlySet<Role> = new Set<Role>(["dcc_analysts", "dcc_developers"]);

// Tagging and responding come only from tagger membership of the study.
const DCC_CAPABILITIES: readonly Capability[] = [Capability.DccReview, Capability.DccDecide];

const STUDY_CAPABILITIES: readonly Capability[] = [Capability.Tag, Capability.StudyRespond];

export function capabilitiesFor(actor: Actor, studyId: number): ReadonlySet<Capability> {
  const capabilities = new Set<Capability>();
  if (actor.roles.some((role) => DCC_ROLES.has(role))) {
    for (const capability of DCC_CAPABILITIES) capabilities.add(capability);
  }
  if (
    actor.roles.includes("phenotype_taggers") &&
    actor.taggableStudyIds.includes(studyId)
  ) {
    for (const capability of STUDY_CAPABILITIES) capabilities.add(capability);
  }
  return capabilities;
}

export function hasCapability(
  actor: Actor,
  studyId: number,
  capability: Capability,
): boolean {
  return capabilitiesFor(actor, studyId).has(capability);
}

export function requireCapability(
  actor: Actor,
  studyId: number,
  capability: Capability,
): void {
  if (hasCapability(actor, studyId, capability)) return;
  throw new PermissionError({
    message: `${actor.name} lacks the ${capability} capability for study ${formatStudyAccession(studyId)}`,
  });
}
