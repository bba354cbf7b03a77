export interface StashSceneStashId {
  endpoint: string;
  stash_id: string;
}

export interface StashScene {
  id: string;
  title: string | null;
  date: string | null;
  studio: { name: string } | null;
  stash_ids: StashSceneStashId[];
  performers: Array<{ name: string | null }>;
  files: Array<{ path: string }>;
}

export interface FindScenesResponse {
  data?: {
    findScenes?: {
      count: number;
      scenes: StashScene[];
    };
  };
  errors?: Array<{ message: string }>;
}

/**
 * A scene from the Stash index. `stashId` links it to StashDB; entries
 * without one are never sent to Whisparr.
 */
export interface CatalogEntry {
  id: string;
  title: string;
  date?: string;
  studio?: string;
  performers: string[];
  files: string[];
  stashId?: string;
  endpoint?: string;
}

export interface CatalogIndex {
  listEntries(): Promise<CatalogEntry[]>;
}
