export interface WhisparrRootFolder {
  id: number;
  path: string;
  accessible?: boolean;
  freeSpace?: number;
}

export interface WhisparrMovie {
  id: number;
  title: string;
  stashId?: string | null;
  foreignId?: string | null;
  path?: string | null;
}

export interface WhisparrAddMovieBody {
  title: string;
  foreignId: string;
  stashId: string;
  qualityProfileId: number;
  monitored: boolean;
  rootFolderPath: string;
  addOptions: {
    searchForMovie: boolean;
    monitor: 'movieOnly';
  };
  tags?: number[];
}

interface ManualImportEntity {
  id?: number;
  title?: string;
  path?: string | null;
}

export interface ManualImportItem {
  path: string;
  relativePath?: string;
  folderName?: string;
  name?: string;
  size?: number;
  movie?: ManualImportEntity | null;
  scene?: ManualImportEntity | null;
  quality?: unknown;
  languages?: unknown[];
  releaseGroup?: string | null;
  downloadId?: string | null;
  rejections?: Array<{ reason?: string; type?: string }>;
}

export interface CommandResponse {
  id?: number;
  name?: string;
  status?: string;
}

/** A scene Whisparr already tracks. */
export interface ManagerRecord {
  id: number;
  title: string;
  stashId?: string;
}

export interface AddEntryRequest {
  title: string;
  stashId: string;
  qualityProfileId: number;
  rootFolderPath: string;
  tagIds: readonly number[];
}

export type AddEntryResult = { status: 'added'; record: ManagerRecord } | { status: 'exists' };

export interface CandidateMatch {
  movieId: number;
  title: string;
  folderPath?: string;
}

/**
 * Whisparr's verdict on one file. `match` is null when no scene could be
 * identified; `potentialTitle` is set when a scene was guessed but has no id.
 */
export interface ImportCandidate {
  path: string;
  match: CandidateMatch | null;
  potentialTitle?: string;
  rejections: string[];
  item: ManualImportItem;
}

export interface TransferredFile {
  source: string;
  candidate: ImportCandidate;
  match: CandidateMatch;
  destination: string;
}

export interface MediaManager {
  listRootFolders(): Promise<WhisparrRootFolder[]>;
  listRecords(): Promise<ManagerRecord[]>;
  addEntry(request: AddEntryRequest): Promise<AddEntryResult>;
  scanFolder(folder: string): Promise<ImportCandidate[]>;
  confirmImport(files: readonly TransferredFile[]): Promise<number>;
}
