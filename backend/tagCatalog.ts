import { Schema } from "effect";
import { ConflictError, ValidationError } from "./errors";
import { EntityId } from "./schema";

export const Tag = Schema.Struct({
  id: EntityId,
  title: Schema.String,
  // Case-insensitive uniqueness key.
  lowerTitle: Schema.String,
  description: Schema.String,
  instructions: Schema.String,
  creatorId: EntityId,
});
export type Tag = typeof Tag.Type;

export interface NewTag {
  title: string;
  description: string;
  instructions?: string;
  creatorId: number;
}

/** Controlled vocabulary of phenotype concepts, curated by DCC staff. */
export interface TagCatalog {
  getTag(id: number): Promise<Tag | null>;
}

export function createMemoryTagCatalog() {
  const tags = new Map<number, Tag>();
  let nextId = 1;

  function findByTitle(title: string): Tag | null {
    const lowerTitle = title.trim().toLowerCase();
    for (const tag of tags.values()) {
      if (tag.lowerTitle === lowerTitle) return tag;
    }
    return null;
  }

  function addTag(input: NewTag): Tag {
    const title = input.title.trim();
    if (title === "") {
      throw new ValidationError({ field: "title", message: "Tag title is required" });
    }
    if (findByTitle(title)) {
      throw new ConflictError({
        reason: "duplicate",
        message: `A tag titled "${title}" already exists`,
      });
    }

    const tag: Tag = {
      id: nextId,
      title,
      lowerTitle: title.toLowerCase(),
      description: input.description,
      instructions: input.instructions ?? "",
      creatorId: input.creatorId,
    };
    tags.set(tag.id, tag);
    nextId += 1;
    return tag;
  }

  function listTags(): Tag[] {
    return [...tags.values()].sort((a, b) => a.lowerTitle.localeCompare(b.lowerTitle));
  }

  async function getTag(id: number): Promise<Tag | null> {
    return tags.get(id) ?? null;
  }

  return { getTag, addTag, findByTitle, listTags };
}

export type MemoryTagCatalog = ReturnType<typeof createMemoryTagCatalog>;
