/**
 * Profile Registry
 * Tracks which profiles to scrape and where each one is in its lifecycle:
 *
 *   pending -> scraping -> completed | failed
 *   failed  -> scraping (retry by name) or pending (reset)
 *   any     -> skipped (explicit), any -> pending (reset)
 *
 * Every operation is a single synchronous statement or transaction, so
 * state changes are atomic and a profile can only be claimed once.
 */

import type { Db } from '../db.js';
import { persist } from '../db.js';
import { ProfileNotFoundError, StateTransitionError } from '../errors.js';
import { PROFILE_STATUSES } from '../types.js';
import type { ClaimResult, Profile, ProfileStatus } from '../types.js';

// Allowed sources for each tracked transition (skip and reset accept any state)
const ALLOWED_FROM: Record<'scraping' | 'completed' | 'failed', readonly ProfileStatus[]> = {
    scraping: ['pending', 'scraping', 'failed'],
    completed: ['scraping'],
    failed: ['scraping'],
};

const TERMINAL: readonly ProfileStatus[] = ['completed', 'skipped'];

interface ProfileRow {
    handle: string;
    status: string;
    addedAt: string;
    lastScrapedAt: string | null;
    postCount: number;
    totalPostCount: number;
    failureReason: string | null;
    errorCount: number;
    lastErrorAt: string | null;
}

const PROFILE_COLUMNS = 'handle, status, addedAt, lastScrapedAt, postCount, totalPostCount, failureReason, errorCount, lastErrorAt';

function isProfileStatus(value: string): value is ProfileStatus {
    return (PROFILE_STATUSES as readonly string[]).includes(value);
}

function rowToProfile(row: ProfileRow): Profile {
    if (!isProfileStatus(row.status)) {
        throw new Error(`Unknown status "${row.status}" stored for @${row.handle}`);
    }
    return {
        handle: row.handle,
        status: row.status,
        addedAt: row.addedAt,
        lastScrapedAt: row.lastScrapedAt,
        postCount: row.postCount,
        totalPostCount: row.totalPostCount,
        failureReason: row.failureReason,
        errorCount: row.errorCount,
        lastErrorAt: row.lastErrorAt,
    };
}

/**
 * Normalize a user-supplied handle: trim, drop leading @ signs, lower-case.
 */
export function normalizeHandle(handle: string): string {
    return handle.trim().replace(/^@+/, '').trim().toLowerCase();
}

function normalizeAll(handles: Iterable<string>): string[] {
    const seen = new Set<string>();
    for (const handle of handles) {
        const normalized = normalizeHandle(handle);
        if (normalized) seen.add(normalized);
    }
    return [...seen];
}

export interface ResetOptions {
    clearHistory?: boolean;
}

export class ProfileRegistry {
    constructor(
        private readonly db: Db,
        private readonly now: () => Date = () => new Date(),
    ) { }

    add(handles: Iterable<string>): number {
        const insert = this.db.prepare(
            'INSERT OR IGNORE INTO profiles (handle, status, addedAt) VALUES (?, \'pending\', ?)'
        );
        const addedAt = this.now().toISOString();
        const insertMany = this.db.transaction((list: string[]) => {
            let added = 0;
            for (const handle of list) {
                added += insert.run(handle, addedAt).changes;
            }
            return added;
        });

        const added = persist('Adding profiles', () => insertMany(normalizeAll(handles)));
        if (added > 0) console.log(`[Registry] Added ${added} profile(s)`);
        return added;
    }

    remove(handles: Iterable<string>): number {
        const remove = this.db.prepare('DELETE FROM profiles WHERE handle = ?');
        const removeMany = this.db.transaction((list: string[]) => {
            let removed = 0;
            for (const handle of list) {
                removed += remove.run(handle).changes;
            }
            return removed;
        });

        const removed = persist('Removing profiles', () => removeMany(normalizeAll(handles)));
        if (removed > 0) console.log(`[Registry] Removed ${removed} profile(s)`);
        return removed;
    }

    listAll(): Profile[] {
        const rows = persist('Listing profiles', () =>
            this.db.prepare(`SELECT ${PROFILE_COLUMNS} FROM profiles ORDER BY id ASC`).all() as ProfileRow[]
        );
        return rows.map(rowToProfile);
    }

    get(handle: string): Profile | null {
        const row = persist('Reading profile', () =>
            this.db.prepare(`SELECT ${PROFILE_COLUMNS} FROM profiles WHERE handle = ?`).get(normalizeHandle(handle)) as ProfileRow | undefined
        );
        return row ? rowToProfile(row) : null;
    }

    nextPending(): Profile | null {
        const row = persist('Reading pending profiles', () =>
            this.db.prepare(
                `SELECT ${PROFILE_COLUMNS} FROM profiles WHERE status = 'pending' ORDER BY id ASC LIMIT 1`
            ).get() as ProfileRow | undefined
        );
        return row ? rowToProfile(row) : null;
    }

    /**
     * Take the next pending profile and move it to scraping in one step.
     */
    claimNext(): Profile | null {
        const claim = this.db.transaction((): Profile | null => {
            const next = this.nextPending();
            if (!next) return null;
            return this.markScraping(next.handle);
        });
        return persist('Claiming profile', () => claim(), [StateTransitionError, ProfileNotFoundError]);
    }

    /**
     * Claim a specific profile. Completed and skipped profiles are left alone
     * until they are reset.
     */
    claim(handle: string): ClaimResult {
        const claim = this.db.transaction((): ClaimResult => {
            const profile = this.get(handle);
            if (!profile) return { ok: false, reason: 'not-found' };
            if (TERMINAL.includes(profile.status)) return { ok: false, reason: 'terminal' };
            return { ok: true, profile: this.markScraping(profile.handle) };
        });
        return persist('Claiming profile', () => claim(), [StateTransitionError, ProfileNotFoundError]);
    }

    markScraping(handle: string): Profile {
        return this.transition(handle, 'scraping', {});
    }

    /**
     * @param postCount - slideshow posts stored for the profile
     * @param totalPostCount - posts the scrape fetched; kept as is when omitted
     */
    markCompleted(handle: string, postCount: number, totalPostCount?: number): Profile {
        return this.transition(handle, 'completed', {
            lastScrapedAt: this.now().toISOString(),
            postCount,
            ...(totalPostCount === undefined ? {} : { totalPostCount }),
            failureReason: null,
        });
    }

    markFailed(handle: string, reason: string): Profile {
        const trimmed = reason.trim() || 'Unknown error';
        const current = this.require(handle);
        return this.transition(handle, 'failed', {
            failureReason: trimmed,
            errorCount: current.errorCount + 1,
            lastErrorAt: this.now().toISOString(),
        });
    }

    markSkipped(handle: string): Profile {
        const profile = this.require(handle);
        return this.write(profile.handle, { status: 'skipped' });
    }

    /**
     * Return profiles to pending. Unknown handles are ignored.
     */
    reset(handles: Iterable<string>, options: ResetOptions = {}): number {
        const base = 'status = \'pending\', failureReason = NULL, errorCount = 0, lastErrorAt = NULL';
        const sql = options.clearHistory
            ? `UPDATE profiles SET ${base}, postCount = 0, totalPostCount = 0, lastScrapedAt = NULL WHERE handle = ?`
            : `UPDATE profiles SET ${base} WHERE handle = ?`;
        const update = this.db.prepare(sql);
        const resetMany = this.db.transaction((list: string[]) => {
            let changed = 0;
            for (const handle of list) {
                changed += update.run(handle).changes;
            }
            return changed;
        });

        const changed = persist('Resetting profiles', () => resetMany(normalizeAll(handles)));
        if (changed > 0) console.log(`[Registry] Reset ${changed} profile(s) to pending`);
        return changed;
    }

    statusCounts(): Record<ProfileStatus, number> {
        const counts: Record<ProfileStatus, number> = {
            pending: 0,
            scraping: 0,
            completed: 0,
            failed: 0,
            skipped: 0,
        };
        const rows = persist('Counting profiles', () =>
            this.db.prepare('SELECT status, COUNT(*) AS count FROM profiles GROUP BY status').all() as Array<{ status: string; count: number }>
        );
        for (const row of rows) {
            if (isProfileStatus(row.status)) counts[row.status] = row.count;
        }
        return counts;
    }

    private require(handle: string): Profile {
        const profile = this.get(handle);
        if (!profile) throw new ProfileNotFoundError(normalizeHandle(handle));
        return profile;
    }

    private transition(handle: string, to: keyof typeof ALLOWED_FROM, fields: Partial<Profile>): Profile {
        const profile = this.require(handle);
        if (!ALLOWED_FROM[to].includes(profile.status)) {
            throw new StateTransitionError(profile.handle, profile.status, to);
        }
        return this.write(profile.handle, { ...fields, status: to });
    }

    private write(handle: string, fields: Partial<Profile>): Profile {
        const entries = Object.entries(fields).filter(([key]) => key !== 'handle');
        const assignments = entries.map(([key]) => `${key} = @${key}`).join(', ');
        const params: Record<string, unknown> = { handle };
        for (const [key, value] of entries) params[key] = value;

        persist(`Updating @${handle}`, () =>
            this.db.prepare(`UPDATE profiles SET ${assignments} WHERE handle = @handle`).run(params)
        );
        return this.require(handle);
    }
}
