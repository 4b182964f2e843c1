/**
 * Repository Interfaces
 *
 * Defines contracts for all repository implementations.
 * Used for dependency injection and testing.
 */

import type {
  Revision,
  NewRevision,
  FlagType,
  NewFlagType,
  OpinionType,
  NewOpinionType,
  CategoryType,
  NewCategoryType,
  Client,
  User,
  FlagRow,
  NewFlagRow,
  OpinionRow,
  VoteRow,
  Decision,
  DataMetadata,
} from '../../db/schema.js';
import type { UnixSeconds } from '../types.js';

// =============================================================================
// CATALOGS
// =============================================================================

export interface IRevisionRepository {
  create(input: NewRevision): Promise<Revision>;
  getById(id: number): Promise<Revision | undefined>;
  getByName(name: string): Promise<Revision | undefined>;
  list(): Promise<Revision[]>;
}

/**
 * Named catalog (flag types, opinion types, category types)
 */
export interface ICatalogRepository<TRow, TInsert> {
  create(input: TInsert): Promise<TRow>;
  getById(id: number): Promise<TRow | undefined>;
  getByName(name: string): Promise<TRow | undefined>;
  list(): Promise<TRow[]>;
}

export type IFlagTypeRepository = ICatalogRepository<FlagType, NewFlagType>;
export type IOpinionTypeRepository = ICatalogRepository<OpinionType, NewOpinionType>;
export type ICategoryRepository = ICatalogRepository<CategoryType, NewCategoryType>;

export interface IUserRepository {
  add(userName: string): Promise<User>;
  getByName(userName: string): Promise<User | undefined>;
  list(): Promise<User[]>;
}

export interface IClientRepository {
  getOrCreate(clientName: string, clientVersion: string): Promise<Client>;
  getById(id: number): Promise<Client | undefined>;
}

// =============================================================================
// FLAG REPOSITORY
// =============================================================================

/**
 * A flag joined with its type name
 */
export interface Flag extends FlagRow {
  typeName: string;
}

export interface ListFlagsFilter {
  typeId?: number;
  /** Only flags still active at or after this time */
  start?: UnixSeconds;
  /** Only flags starting at or before this time */
  finish?: UnixSeconds;
}

export interface UpdateFlagInput {
  typeId?: number;
  startTime?: UnixSeconds;
  finishTime?: UnixSeconds | null;
  metadata?: DataMetadata | null;
}

export interface IFlagRepository {
  create(input: NewFlagRow): Promise<Flag>;
  getById(id: number): Promise<Flag | undefined>;
  update(id: number, input: UpdateFlagInput): Promise<Flag | undefined>;
  list(filter?: ListFlagsFilter): Promise<Flag[]>;
}

// =============================================================================
// OPINION REPOSITORY
// =============================================================================

/**
 * An opinion joined with the names of its type, author and revision
 */
export interface Opinion extends OpinionRow {
  typeName: string;
  userName: string;
  revisionName: string;
}

export interface OpinionKey {
  typeId: number;
  userId: number;
  lsd: number;
  revisionId: number;
}

export interface UpsertOpinionInput extends OpinionKey {
  decision: Decision;
  clientId: number;
  /** Creation time and first last_edit of a new row */
  creationTime: UnixSeconds;
  /** last_edit candidate when the key already exists */
  editTime: UnixSeconds;
  notes?: string | null;
  metadata?: DataMetadata | null;
  categoryIds?: number[];
}

export interface UpdateOpinionInput {
  typeId?: number;
  lsd?: number;
  decision?: Decision;
  notes?: string | null;
  lastEdit: UnixSeconds;
}

export interface ListOpinionsFilter {
  revisionId?: number;
  typeId?: number;
  userId?: number;
  lsd?: number;
  decision?: Decision;
}

export interface CandidateFilter {
  revisionId: number;
  minLastEdit: UnixSeconds;
  /** Exclude opinions a vote of this mode has seen since their last edit */
  unconsideredBy: string;
}

export interface IOpinionRepository {
  /**
   * Insert, or update the opinion with the same (type, user, lsd, revision).
   * last_edit never moves backwards.
   */
  upsert(input: UpsertOpinionInput): Promise<Opinion>;
  getById(id: number): Promise<Opinion | undefined>;
  getByKey(key: OpinionKey): Promise<Opinion | undefined>;
  update(id: number, input: UpdateOpinionInput): Promise<Opinion | undefined>;
  list(filter?: ListOpinionsFilter): Promise<Opinion[]>;
  /** Candidates for a voting run, ascending by id */
  listCandidates(filter: CandidateFilter): Promise<Opinion[]>;
  /** Opinions on the same LSD and revision whose decision differs from `decision` */
  countConflicting(lsd: number, revisionId: number, decision: Decision): Promise<number>;
  getCategories(opinionId: number): Promise<CategoryType[]>;
}

// =============================================================================
// VOTE REPOSITORY
// =============================================================================

export interface RecordVoteInput {
  time: UnixSeconds;
  mode: string;
  clientId: number;
  revisionId: number;
  lsd: number;
  opinionIds: number[];
  /**
   * Flag for the vote's LSD. A flag already produced by this mode for the
   * same revision and LSD is linked instead of inserting a second one.
   */
  flag?: NewFlagRow;
}

export interface RecordedVote {
  vote: VoteRow;
  flag?: FlagRow;
  /** False when the vote was linked to an existing flag */
  flagCreated: boolean;
}

export interface Vote extends VoteRow {
  opinionIds: number[];
}

export interface ListVotesFilter {
  mode?: string;
  revisionId?: number;
  lsd?: number;
}

export interface IVoteRepository {
  /** Latest vote time for `mode` across every revision */
  latestTime(mode: string): Promise<UnixSeconds | undefined>;
  /** Write the flag (if any), the vote and its opinion links in one transaction */
  record(input: RecordVoteInput): Promise<RecordedVote>;
  list(filter?: ListVotesFilter): Promise<Vote[]>;
}

// =============================================================================
// AGGREGATE
// =============================================================================

export interface Repositories {
  revisions: IRevisionRepository;
  flagTypes: IFlagTypeRepository;
  opinionTypes: IOpinionTypeRepository;
  categories: ICategoryRepository;
  users: IUserRepository;
  clients: IClientRepository;
  flags: IFlagRepository;
  opinions: IOpinionRepository;
  votes: IVoteRepository;
}
