import { JobPosting } from '../types/job';
import { MatchRecord, MatchRecordWithJob } from '../types/match';
import { NewUser, User } from '../types/user';
import { withClient } from './client';
import { JobsRepository } from './jobs';
import { MatchesRepository } from './matches';
import { UsersRepository } from './users';

export interface UserStore {
  /** Throws StoreConstraintViolation when the email is taken */
  createUser(user: NewUser): Promise<User>;
  getUser(id: number): Promise<User | null>;
  listUsersWithCv(): Promise<User[]>;
  /** Replaces CV text, filename and vector together; null when the user does not exist */
  replaceCv(id: number, cv: { cvText: string; cvFilename: string; cvVector: number[] | null }): Promise<User | null>;
  updateCvVector(id: number, cvVector: number[]): Promise<void>;
}

export interface JobStore {
  findExistingJobIds(ids: string[]): Promise<Set<string>>;
  /** False when a posting with the same id already exists */
  insertJob(job: JobPosting): Promise<boolean>;
  /** Postings first seen since `since` with no match record for the user */
  getCandidateJobsForUser(userId: number, since: Date): Promise<JobPosting[]>;
}

export interface MatchStore {
  hasMatch(userId: number, jobId: string): Promise<boolean>;
  /** Throws StoreConstraintViolation when the pair was already recorded */
  recordMatch(record: MatchRecord): Promise<void>;
  listMatchesForUser(userId: number): Promise<MatchRecordWithJob[]>;
}

export type Store = UserStore & JobStore & MatchStore;

/**
 * Store backed by PostgreSQL through the repositories
 */
export class PostgresStore implements Store {
  constructor(
    private usersRepo = new UsersRepository(),
    private jobsRepo = new JobsRepository(),
    private matchesRepo = new MatchesRepository()
  ) {}

  createUser(user: NewUser): Promise<User> {
    return withClient(client => this.usersRepo.insertUser(client, user));
  }

  getUser(id: number): Promise<User | null> {
    return withClient(client => this.usersRepo.getUserById(client, id));
  }

  listUsersWithCv(): Promise<User[]> {
    return withClient(client => this.usersRepo.getUsersWithCv(client));
  }

  replaceCv(
    id: number,
    cv: { cvText: string; cvFilename: string; cvVector: number[] | null }
  ): Promise<User | null> {
    return withClient(client => this.usersRepo.replaceCv(client, id, cv));
  }

  updateCvVector(id: number, cvVector: number[]): Promise<void> {
    return withClient(client => this.usersRepo.updateCvVector(client, id, cvVector));
  }

  findExistingJobIds(ids: string[]): Promise<Set<string>> {
    return withClient(client => this.jobsRepo.findExistingIds(client, ids));
  }

  insertJob(job: JobPosting): Promise<boolean> {
    return withClient(client => this.jobsRepo.insertJobIfNotExists(client, job));
  }

  getCandidateJobsForUser(userId: number, since: Date): Promise<JobPosting[]> {
    return withClient(client => this.jobsRepo.getCandidateJobsForUser(client, userId, since));
  }

  hasMatch(userId: number, jobId: string): Promise<boolean> {
    return withClient(client => this.matchesRepo.exists(client, userId, jobId));
  }

  recordMatch(record: MatchRecord): Promise<void> {
    return withClient(client => this.matchesRepo.insertMatch(client, record));
  }

  listMatchesForUser(userId: number): Promise<MatchRecordWithJob[]> {
    return withClient(client => this.matchesRepo.listForUser(client, userId));
  }
}
