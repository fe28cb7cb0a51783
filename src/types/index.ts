// Shared domain types for the song-of-the-day engine

export type MediaType = 'track' | 'episode';
export type PlaySource = 'recently_played' | 'current_playback';
export type AdditionSource = 'user' | 'auto';
export type SelectionMode = 'most_played' | 'weighted_random' | 'strongly_weighted_random';

// One listening occurrence as stored in a day's ledger
export interface PlayEvent {
  trackId: string;
  trackName: string;
  artist: string; // joined display string, e.g. "A, B"
  playedAt: string; // ISO 8601 UTC
  durationMs: number;
  type: MediaType;
  contextType: string | null;
  source: PlaySource;
}

export interface DailyLedger {
  date: string; // YYYY-MM-DD in the profile timezone
  lastPoll: string | null;
  lastCurrentTrackId: string | null;
  plays: PlayEvent[];
  playCounts: Record<string, number>;
}

export interface PlaylistEntry {
  trackId: string;
  trackName: string;
  artist: string;
  addedAt: string;
  durationMs: number;
  position: number;
}

export interface PlaylistSnapshot {
  playlistId: string;
  playlistName: string;
  lastChecked: string;
  trackCount: number;
  tracks: PlaylistEntry[];
}

export interface AdditionRecord {
  date: string;
  trackId: string;
  trackName: string;
  artist: string;
  source: AdditionSource;
  recordedAt: string;
}

// Catalog-side shapes (kept minimal to avoid leaking the client library's types)
export interface CatalogTrack {
  id: string | null; // null for local or unavailable media
  name: string;
  artists: string[];
  durationMs: number;
  type: MediaType;
}

export interface RecentPlay {
  track: CatalogTrack;
  playedAt: string;
  contextType: string | null;
}

export interface PlaybackState {
  isPlaying: boolean;
  item: CatalogTrack | null;
  contextType: string | null;
}

export interface PlaylistRef {
  id: string;
  name: string;
}

export interface PlaylistItem {
  track: CatalogTrack | null;
  addedAt: string | null;
}

export interface LikedItem {
  track: CatalogTrack;
  addedAt: string;
}

export interface ICatalog {
  listRecentlyPlayed(): AsyncIterable<RecentPlay[]>;
  getCurrentPlayback(): Promise<PlaybackState | null>;
  findPlaylistByName(name: string): Promise<PlaylistRef | null>;
  createPlaylist(name: string, isPublic: boolean, description: string): Promise<PlaylistRef>;
  listPlaylistTracks(playlistId: string): AsyncIterable<PlaylistItem[]>;
  addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void>;
  removeTracksFromPlaylist(playlistId: string, trackIds: string[]): Promise<void>;
  listLikedTracks(): AsyncIterable<LikedItem[]>;
  getCurrentUserDisplay?(): Promise<string>;
}

// Keyed whole-document persistence; values are plain JSON
export interface IDocumentStore {
  get(key: string): Promise<unknown | null>;
  set(key: string, value: unknown): Promise<void>;
}

export interface RenderedMessage {
  subject: string;
  text: string;
  html?: string;
}

export interface INotifier {
  send(message: RenderedMessage): Promise<boolean>;
}

export type Clock = () => Date;
export type RandomSource = () => number; // uniform in [0, 1)

// Candidate pools

export type TierName = 'liked_today' | 'today' | 'last_2_days' | 'last_3_days' | 'last_7_days' | 'library';

export interface Candidate {
  trackId: string;
  trackName: string;
  artist: string;
  durationMs: number;
  type: MediaType;
  // Most recent play, or the library add time for liked/library tiers
  lastSeenAt: string;
}

export interface CandidateVerdict {
  candidate: Candidate;
  playCount: number;
  eligible: boolean;
  reason: string;
}

export interface TierReport {
  tier: TierName;
  label: string;
  consulted: boolean;
  eligibleCount: number;
  // Full pre-filter list; populated for the liked_today and today tiers only
  considered: CandidateVerdict[];
}

export interface SelectedTrack {
  candidate: Candidate;
  playCount: number;
  tier: TierName;
}

export interface Resolution {
  pick: SelectedTrack | null;
  tiers: TierReport[];
}

// Reconciliation

export type ReconcileState = 'IDLE' | 'SNAPSHOT_TAKEN' | 'ON_TARGET' | 'CATCHING_UP' | 'DONE' | 'FAILED';

export interface ReportedAddition {
  trackId: string;
  trackName: string;
  artist: string;
  source: AdditionSource;
  tier?: TierName;
  playCount?: number;
}

export interface FinalizeReport {
  profile: string;
  playlistName: string;
  effectiveDate: string;
  dayNumber: number;
  target: number;
  countBefore: number;
  countAfter: number;
  songsNeeded: number;
  dryRun: boolean;
  state: ReconcileState;
  ok: boolean;
  behindSchedule: boolean;
  earlierAdditions: ReportedAddition[];
  autoAdditions: ReportedAddition[];
  tiers: TierReport[];
  warnings: string[];
  error: string | null;
}
