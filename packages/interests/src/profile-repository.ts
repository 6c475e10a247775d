/**
 * @fileoverview Interest Profile Repository
 * @description The user's committed interest selections, one entry per (level, leaf id)
 */

import {
  ApiError,
  ApiErrorType,
  ClientConfig,
  Logger,
  MutationResult,
  SerialQueue,
  StateStore,
  duplicateSelectionError,
  formatIssues,
  isApiError,
  scopedLogger,
  toApiError,
} from '@circles/core';
import { InterestApi } from './interest-api';
import {
  InterestLevelKind,
  ProfileSelection,
  UserInterestProfile,
  leafId,
  leafKey,
  profileSchema,
  selectionLeafId,
} from './models';

export interface ProfileState {
  profiles: UserInterestProfile[];
  loaded: boolean;
  error: ApiError | null;
}

/** Write side the selection machine depends on. */
export interface ProfileWriter {
  contains(level: InterestLevelKind, id: string): boolean;
  add(selection: ProfileSelection, displayName?: string): Promise<MutationResult<UserInterestProfile>>;
}

const SERVER_DUPLICATE_DETAIL = /already|既に/i;

export class ProfileRepository implements ProfileWriter {
  readonly state = new StateStore<ProfileState>({ profiles: [], loaded: false, error: null });

  private keys = new Set<string>();
  private queue = new SerialQueue();
  private log: Logger;

  constructor(
    private api: InterestApi,
    config: Pick<ClientConfig, 'logger'>,
  ) {
    this.log = scopedLogger(config.logger, 'Profiles');
  }

  list(): UserInterestProfile[] {
    return this.state.getState().profiles;
  }

  contains(level: InterestLevelKind, id: string): boolean {
    return this.keys.has(leafKey(level, id));
  }

  findByLeaf(level: InterestLevelKind, id: string): UserInterestProfile | undefined {
    return this.list().find((p) => p.level.kind === level && leafId(p.level) === id);
  }

  /** Reload from the server. A 404 means the user has no profile yet. */
  refresh(): Promise<MutationResult<UserInterestProfile[]>> {
    return this.queue.run(async () => {
      try {
        const profiles = await this.api.fetchProfiles();
        this.replace(profiles);
        return { ok: true, value: profiles };
      } catch (err) {
        const error = toApiError(err);
        if (error.isNotFound) {
          this.replace([]);
          return { ok: true, value: [] };
        }
        this.log.error(`Failed to load profiles: ${error.message}`);
        this.state.setState({ error });
        return { ok: false, error };
      }
    });
  }

  /**
   * Duplicates are rejected before any request goes out; a server-side
   * duplicate rejection maps onto the same error.
   */
  add(selection: ProfileSelection, displayName?: string): Promise<MutationResult<UserInterestProfile>> {
    return this.queue.run(async () => {
      const id = selectionLeafId(selection);
      const name = displayName ?? id;
      if (this.contains(selection.level, id)) {
        return { ok: false, error: duplicateSelectionError(name) };
      }

      let raw: unknown;
      try {
        raw = await this.api.createProfile(selection);
      } catch (err) {
        const error = this.isServerDuplicate(err) ? duplicateSelectionError(name) : toApiError(err);
        this.log.warn(`Add ${selection.level} ${id} failed: ${error.message}`);
        this.state.setState({ error });
        return { ok: false, error };
      }

      const created = this.tryDecode(raw);
      if (created) {
        this.replace([...this.list(), created]);
        return { ok: true, value: created };
      }

      // some create endpoints answer with a status body instead of the entry
      return this.reconcileAfterCreate(selection.level, id);
    });
  }

  /** Optimistic: the entry disappears at once and comes back if the server refuses. */
  remove(profileId: string): Promise<MutationResult<UserInterestProfile>> {
    return this.queue.run(async () => {
      const before = this.list();
      const index = before.findIndex((p) => p.id === profileId);
      if (index === -1) {
        return { ok: false, error: new ApiError(ApiErrorType.HTTP_STATUS, 'Profile not found', { status: 404 }) };
      }
      const removed = before[index];
      this.replace(before.filter((p) => p.id !== profileId));

      try {
        await this.api.deleteProfile(profileId);
        return { ok: true, value: removed };
      } catch (err) {
        const error = toApiError(err);
        if (error.isNotFound) return { ok: true, value: removed };

        this.log.error(`Remove ${profileId} failed, restoring: ${error.message}`);
        const restored = [...this.list()];
        restored.splice(Math.min(index, restored.length), 0, removed);
        this.replace(restored);
        this.state.setState({ error });
        return { ok: false, error };
      }
    });
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private async reconcileAfterCreate(
    level: InterestLevelKind,
    id: string,
  ): Promise<MutationResult<UserInterestProfile>> {
    try {
      this.replace(await this.api.fetchProfiles());
    } catch (err) {
      const error = toApiError(err);
      this.log.error(`Reload after create failed: ${error.message}`);
      return { ok: false, error };
    }
    const created = this.findByLeaf(level, id);
    if (created) return { ok: true, value: created };
    return { ok: false, error: new ApiError(ApiErrorType.DECODE, 'Created profile missing from list') };
  }

  private tryDecode(raw: unknown): UserInterestProfile | null {
    const result = profileSchema.safeParse(raw);
    if (result.success) return result.data;
    this.log.debug(`Create response did not decode: ${formatIssues(result.error)}`);
    return null;
  }

  private isServerDuplicate(err: unknown): boolean {
    if (!isApiError(err) || err.type !== ApiErrorType.HTTP_STATUS) return false;
    if (err.status === 409) return true;
    return err.status === 400 && SERVER_DUPLICATE_DETAIL.test(err.detail ?? '');
  }

  private replace(profiles: UserInterestProfile[]): void {
    this.keys = new Set(profiles.map((p) => leafKey(p.level.kind, leafId(p.level))));
    this.state.setState({ profiles, loaded: true, error: null });
  }
}
