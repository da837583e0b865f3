/**
 * SQLite database for profile state and scraped posts
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { PersistenceError, describeError } from './errors.js';

export type Db = Database.Database;

export interface OpenedDatabase {
    db: Db;
    warnings: string[];
}

const SCHEMA = `
    -- Tracked profiles (insertion order = id order)
    CREATE TABLE IF NOT EXISTS profiles (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        handle TEXT NOT NULL UNIQUE,
        status TEXT NOT NULL DEFAULT 'pending'
            CHECK(status IN ('pending', 'scraping', 'completed', 'failed', 'skipped')),
        addedAt TEXT NOT NULL,
        lastScrapedAt TEXT,
        postCount INTEGER NOT NULL DEFAULT 0,
        totalPostCount INTEGER NOT NULL DEFAULT 0,
        failureReason TEXT,
        errorCount INTEGER NOT NULL DEFAULT 0,
        lastErrorAt TEXT
    );

    -- Retained slideshow posts (capture order = id order within a profile)
    CREATE TABLE IF NOT EXISTS posts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        profileHandle TEXT NOT NULL REFERENCES profiles(handle) ON DELETE CASCADE,
        postId TEXT NOT NULL,
        caption TEXT NOT NULL DEFAULT '',
        mediaType TEXT NOT NULL,
        imageCount INTEGER,
        likes INTEGER NOT NULL DEFAULT 0,
        views INTEGER NOT NULL DEFAULT 0,
        comments INTEGER NOT NULL DEFAULT 0,
        shares INTEGER NOT NULL DEFAULT 0,
        bookmarks INTEGER NOT NULL DEFAULT 0,
        postedAt TEXT,
        capturedAt TEXT NOT NULL,
        hookText TEXT,
        hookCategory TEXT,
        hookScore REAL,
        UNIQUE(profileHandle, postId)
    );
    CREATE INDEX IF NOT EXISTS idx_posts_profile ON posts(profileHandle, id);
`;

function initialize(db: Db): void {
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA);
    // Touch both tables so an unreadable file fails here rather than mid-run
    db.prepare('SELECT COUNT(*) AS count FROM profiles').get();
    db.prepare('SELECT COUNT(*) AS count FROM posts').get();
}

function tryOpen(file: string): Db {
    const db = new Database(file);
    try {
        initialize(db);
        return db;
    } catch (error) {
        db.close();
        throw error;
    }
}

/**
 * Open (or create) the database. A file that exists but cannot be read as a
 * database is moved aside and replaced by an empty one; the caller gets a
 * warning instead of an error.
 */
export function openDatabase(file: string, now: () => Date = () => new Date()): OpenedDatabase {
    if (file === ':memory:') {
        return { db: tryOpen(file), warnings: [] };
    }

    try {
        fs.mkdirSync(path.dirname(file), { recursive: true });
    } catch (error) {
        throw new PersistenceError(`Cannot create data directory for ${file}`, { cause: error });
    }

    try {
        return { db: tryOpen(file), warnings: [] };
    } catch (readError) {
        if (!fs.existsSync(file)) {
            throw new PersistenceError(`Cannot open database ${file}`, { cause: readError });
        }

        const stamp = now().toISOString().replace(/[:.]/g, '-');
        const backup = `${file}.corrupt-${stamp}`;
        try {
            fs.renameSync(file, backup);
            for (const suffix of ['-wal', '-shm']) {
                if (fs.existsSync(file + suffix)) fs.rmSync(file + suffix);
            }
            const db = tryOpen(file);
            const warning = `Could not read ${file} (${describeError(readError)}); moved it to ${backup} and started an empty registry`;
            console.warn(`[DB] ${warning}`);
            return { db, warnings: [warning] };
        } catch (error) {
            throw new PersistenceError(`Cannot recover database ${file}`, { cause: error });
        }
    }
}

/**
 * Run a storage operation, turning driver failures into PersistenceError.
 * Errors raised on purpose by the callback pass through untouched.
 */
export function persist<T>(action: string, fn: () => T, passThrough: ReadonlyArray<new (...args: never[]) => Error> = []): T {
    try {
        return fn();
    } catch (error) {
        if (error instanceof PersistenceError) throw error;
        if (passThrough.some(type => error instanceof type)) throw error;
        throw new PersistenceError(`${action} failed: ${describeError(error)}`, { cause: error });
    }
}
