export { WhisparrClient, toImportCandidate, type WhisparrClientOptions } from './client.js';

export type {
  AddEntryRequest,
  AddEntryResult,
  CandidateMatch,
  ImportCandidate,
  ManagerRecord,
  MediaManager,
  TransferredFile,
  WhisparrRootFolder,
} from './types.js';
