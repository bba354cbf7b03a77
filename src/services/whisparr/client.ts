import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { TransportError } from '../../errors.js';
import { toTransportError } from '../http.js';
import type {
  AddEntryRequest,
  AddEntryResult,
  CommandResponse,
  ImportCandidate,
  ManagerRecord,
  ManualImportItem,
  MediaManager,
  TransferredFile,
  WhisparrAddMovieBody,
  WhisparrMovie,
  WhisparrRootFolder,
} from './types.js';

export interface WhisparrClientOptions {
  url: string;
  apiKey: string;
  adapter?: AxiosAdapter;
}

const TIMEOUTS = {
  rootFolders: 10_000,
  movies: 180_000,
  add: 30_000,
  manualImport: 120_000,
  command: 120_000,
};

export function toImportCandidate(item: ManualImportItem): ImportCandidate {
  const entity = item.scene?.id ? item.scene : item.movie?.id ? item.movie : null;
  const guessed = item.scene ?? item.movie ?? null;
  const rejections = (item.rejections ?? []).map((rejection) => rejection.reason || 'Unknown');

  if (entity && entity.id) {
    return {
      path: item.path,
      match: {
        movieId: entity.id,
        title: entity.title || 'Unknown',
        folderPath: entity.path || undefined,
      },
      rejections,
      item,
    };
  }

  if (guessed) {
    return {
      path: item.path,
      match: null,
      potentialTitle: guessed.title || 'Unknown',
      rejections,
      item,
    };
  }

  return {
    path: item.path,
    match: null,
    rejections: rejections.length > 0 ? rejections : ['No scene/movie data in response'],
    item,
  };
}

// Whisparr answers a duplicate add with 400 and a validation message
function isAlreadyExistsError(error: TransportError): boolean {
  if (error.status !== 400) {
    return false;
  }
  const body = JSON.stringify(error.body ?? '').toLowerCase();
  return body.includes('already') || body.includes('exist');
}

export class WhisparrClient implements MediaManager {
  private client: AxiosInstance;

  constructor(options: WhisparrClientOptions) {
    this.client = axios.create({
      baseURL: `${options.url.replace(/\/+$/, '')}/api/v3`,
      headers: {
        'X-Api-Key': options.apiKey,
      },
      adapter: options.adapter,
    });
  }

  async listRootFolders(): Promise<WhisparrRootFolder[]> {
    try {
      const response = await this.client.get<WhisparrRootFolder[]>('/rootfolder', {
        timeout: TIMEOUTS.rootFolders,
      });
      return response.data;
    } catch (error) {
      throw toTransportError('whisparr', 'listRootFolders', error);
    }
  }

  async listRecords(): Promise<ManagerRecord[]> {
    let movies: WhisparrMovie[];
    try {
      const response = await this.client.get<WhisparrMovie[]>('/movie', { timeout: TIMEOUTS.movies });
      movies = response.data;
    } catch (error) {
      throw toTransportError('whisparr', 'listRecords', error);
    }

    return movies.map((movie) => ({
      id: movie.id,
      title: movie.title,
      stashId: movie.stashId || undefined,
    }));
  }

  async addEntry(request: AddEntryRequest): Promise<AddEntryResult> {
    const body: WhisparrAddMovieBody = {
      title: request.title,
      foreignId: request.stashId,
      stashId: request.stashId,
      qualityProfileId: request.qualityProfileId,
      monitored: true,
      rootFolderPath: request.rootFolderPath,
      addOptions: {
        searchForMovie: false,
        monitor: 'movieOnly',
      },
    };
    if (request.tagIds.length > 0) {
      body.tags = [...request.tagIds];
    }

    try {
      const response = await this.client.post<WhisparrMovie>('/movie', body, { timeout: TIMEOUTS.add });
      const movie = response.data;
      return {
        status: 'added',
        record: {
          id: movie.id,
          title: movie.title || request.title,
          stashId: movie.stashId || request.stashId,
        },
      };
    } catch (error) {
      const transportError = toTransportError('whisparr', 'addEntry', error);
      if (isAlreadyExistsError(transportError)) {
        return { status: 'exists' };
      }
      throw transportError;
    }
  }

  async scanFolder(folder: string): Promise<ImportCandidate[]> {
    try {
      const response = await this.client.get<ManualImportItem[]>('/manualimport', {
        params: { folder, filterExistingFiles: true },
        timeout: TIMEOUTS.manualImport,
      });
      return response.data.map(toImportCandidate);
    } catch (error) {
      throw toTransportError('whisparr', 'scanFolder', error);
    }
  }

  /**
   * Register files that already sit in their scene folder. The import mode is
   * `auto` because the copy or move has been done locally.
   */
  async confirmImport(files: readonly TransferredFile[]): Promise<number> {
    const payload = {
      name: 'ManualImport',
      importMode: 'auto',
      files: files.map(({ candidate, match, destination }) => ({
        path: destination,
        folderName: candidate.item.folderName ?? '',
        movieId: match.movieId,
        quality: candidate.item.quality ?? {},
        languages: candidate.item.languages ?? [],
        releaseGroup: candidate.item.releaseGroup ?? '',
        downloadId: candidate.item.downloadId ?? '',
        importMode: 'auto',
      })),
    };

    let command: CommandResponse;
    try {
      const response = await this.client.post<CommandResponse>('/command', payload, {
        timeout: TIMEOUTS.command,
      });
      command = response.data;
    } catch (error) {
      throw toTransportError('whisparr', 'confirmImport', error);
    }

    if (command.id === undefined) {
      throw new TransportError('whisparr', 'confirmImport', 'command response missing id', { body: command });
    }
    return command.id;
  }
}
