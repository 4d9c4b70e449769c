import { Option, Schema } from "effect";
import { decodeOrThrow } from "./decode";
import { EntityId } from "./schema";

export const Study = Schema.Struct({
  // dbGaP study accession, the number behind "phs".
  id: EntityId,
  name: Schema.String,
});
export type Study = typeof Study.Type;

export const SourceVariable = Schema.Struct({
  id: EntityId,
  accession: EntityId,
  version: EntityId,
  participantSet: EntityId,
  name: Schema.String,
  description: Schema.optionalWith(Schema.String, { default: () => "" }),
  studyId: EntityId,
  studyVersion: EntityId,
  datasetAccession: EntityId,
  deprecated: Schema.optionalWith(Schema.Boolean, { default: () => false }),
});
export type SourceVariable = typeof SourceVariable.Type;

export const TraitDirectoryData = Schema.Struct({
  studies: Schema.Array(Study),
  variables: Schema.Array(SourceVariable),
});
export type TraitDirectoryData = typeof TraitDirectoryData.Encoded;

/**
 * Read-only lookup of dbGaP studies and variables, backed by the imported
 * metadata tables in production.
 */
export interface TraitDirectory {
  getVariable(id: number): Promise<SourceVariable | null>;
  findVariableByAccession(accession: string): Promise<SourceVariable | null>;
  getStudy(id: number): Promise<Study | null>;
  /** The same dbGaP variable in the closest earlier version of its study. */
  getPreviousVersion(variableId: number): Promise<SourceVariable | null>;
}

export interface VariableAccession {
  accession: number;
  version: Option.Option<number>;
  participantSet: Option.Option<number>;
}

const VARIABLE_ACCESSION = /^(?:phv)?0*(\d+)(?:\.v(\d+))?(?:\.p(\d+))?$/i;

function optionalNumber(raw: string | undefined): Option.Option<number> {
  return raw === undefined ? Option.none() : Option.some(Number(raw));
}

export function parseVariableAccession(
  text: string,
): Option.Option<VariableAccession> {
  const match = VARIABLE_ACCESSION.exec(text.trim());
  if (!match) return Option.none();
  const accession = Number(match[1]);
  if (accession === 0) return Option.none();
  return Option.some({
    accession,
    version: optionalNumber(match[2]),
    participantSet: optionalNumber(match[3]),
  });
}

export function formatStudyAccession(studyId: number): string {
  return `phs${String(studyId).padStart(6, "0")}`;
}

export function formatVariableAccession(
  variable: Pick<SourceVariable, "accession" | "version" | "participantSet">,
): string {
  const phv = String(variable.accession).padStart(8, "0");
  return `phv${phv}.v${variable.version}.p${variable.participantSet}`;
}

function newestFirst(a: SourceVariable, b: SourceVariable): number {
  return b.studyVersion - a.studyVersion || b.version - a.version;
}

export function createMemoryTraitDirectory(raw: unknown): TraitDirectory {
  const data = decodeOrThrow("traitDirectory", TraitDirectoryData, raw);
  const studies = new Map(data.studies.map((s) => [s.id, s] as const));
  const variables = new Map(data.variables.map((v) => [v.id, v] as const));

  function withAccession(accession: number): SourceVariable[] {
    return [...variables.values()]
      .filter((v) => v.accession === accession)
      .sort(newestFirst);
  }

  return {
    async getVariable(id) {
      return variables.get(id) ?? null;
    },

    async findVariableByAccession(text) {
      const parsed = parseVariableAccession(text);
      if (Option.isNone(parsed)) return null;
      const { accession, version, participantSet } = parsed.value;

      const candidates = withAccession(accession).filter(
        (v) =>
          Option.match(version, {
            onNone: () => true,
            onSome: (n) => v.version === n,
          }) &&
          Option.match(participantSet, {
            onNone: () => true,
            onSome: (n) => v.participantSet === n,
          }),
      );
      const current = candidates.find((v) => !v.deprecated);
      return current ?? candidates[0] ?? null;
    },

    async getStudy(id) {
      return studies.get(id) ?? null;
    },

    async getPreviousVersion(variableId) {
      const variable = variables.get(variableId);
      if (!variable) return null;
      const earlier = withAccession(variable.accession).filter(
        (v) =>
          v.studyId === variable.studyId &&
          v.studyVersion < variable.studyVersion,
      );
      return earlier[0] ?? null;
    },
  };
}
