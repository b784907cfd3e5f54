/**
 * Character -- a member of the seeded cast (handlers, villains, partners,
 * contacts). Characters are read-only to the game core; they appear in
 * prompts as context and are referenced by nodes, missions and choices.
 */

export interface Character {
  /** Unique identifier, e.g. "char_vesper" */
  characterId: string;

  /** Display name */
  characterName: string;

  /** Casting role, e.g. "mission-giver", "villain", "partner" */
  characterRole?: string;

  /**
   * Personality traits. Either a plain list or a map of trait -> short note
   * (an empty note means the trait stands on its own).
   */
  characterTraits?: string[] | Record<string, string>;

  backstory?: string;

  description?: string;

  imageUrl?: string;
}
