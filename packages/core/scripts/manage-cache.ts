#!/usr/bin/env tsx

import dotenv from 'dotenv';
import { CacheStore, FileCacheStore, validateEnvironment } from '@tourpick/shared';
import { configFromEnvironment } from '../src/config/recommendation.config.js';
import { createCacheStore, createDetailsCacheStore } from '../src/di/bootstrap.js';

dotenv.config();

function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

async function describeStore(label: string, store: CacheStore): Promise<Record<string, string | number>> {
    const stats = await store.stats();
    const row: Record<string, string | number> = {
        Store: label,
        Backend: store.backend,
        'Default TTL (s)': store.defaultTtlSeconds,
        Entries: stats.entryCount,
    };

    if (store instanceof FileCacheStore) {
        const usage = await store.diskUsage();
        row.Location = usage.directory;
        row.Size = formatBytes(usage.totalBytes);
    } else {
        row.Location = '(in-process)';
    }
    return row;
}

async function main() {
    const command = process.argv[2];

    try {
        const env = validateEnvironment();
        const config = configFromEnvironment(env);
        const stores: Array<[string, CacheStore]> = [
            ['searches', createCacheStore(config)],
            ['details', createDetailsCacheStore(config)],
        ];

        switch (command) {
            case 'stats': {
                console.log('\n📊 Cache Stats:\n');
                console.table(await Promise.all(stores.map(([label, store]) => describeStore(label, store))));
                break;
            }

            case 'files': {
                for (const [label, store] of stores) {
                    if (!(store instanceof FileCacheStore)) {
                        console.log(`📭 ${label}: in-process backend, nothing on disk`);
                        continue;
                    }
                    const usage = await store.diskUsage();
                    console.log(`\n📁 ${label} (${usage.directory}): ${usage.fileCount} files, ${formatBytes(usage.totalBytes)}`);
                    for (const file of usage.files) {
                        console.log(`   ${file.name}  ${formatBytes(file.sizeBytes)}  ${file.modifiedAt}`);
                    }
                }
                break;
            }

            case 'purge': {
                let removed = 0;
                for (const [, store] of stores) removed += await store.purgeExpired();
                console.log(`✅ Removed ${removed} expired entr${removed === 1 ? 'y' : 'ies'}`);
                break;
            }

            case 'clear': {
                let removed = 0;
                for (const [, store] of stores) removed += await store.clear();
                console.log(`✅ Cache cleared (${removed} entr${removed === 1 ? 'y' : 'ies'} removed)`);
                break;
            }

            default:
                console.log(`
🗂️  Places Cache Management Tool

Usage:
  npm run cache -- stats     Show backend, TTL, entry count and size per store
  npm run cache -- files     List the cache files on disk
  npm run cache -- purge     Remove expired entries
  npm run cache -- clear     Remove every entry

Reads CACHE_BACKEND, CACHE_DIR and CACHE_TTL_SECONDS from the environment.
                `);
        }

        process.exit(0);
    } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
    }
}

void main();
