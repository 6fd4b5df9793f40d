/**
 * ================================================================================
 * CACHE COMMAND - On-Disk Instance Cache
 * ================================================================================
 *
 * cache stats      file count, expired entries and size
 * cache clear      remove every entry
 * cache cleanup    remove expired and unreadable entries
 */

import { Command } from 'commander';
import { ResourceCache } from '../cache/resourceCache';
import { AppError } from '../utils/errors';
import { AppContext, runAction } from './context';
import { formatCacheStats } from './format';

function requireCache(ctx: AppContext): ResourceCache {
    const cache = ctx.cache();
    if (!cache) {
        throw new AppError('Validation', 'the cache is disabled (cache.enabled: false)');
    }
    return cache;
}

const statsCommand = new Command('stats')
    .description('Show cache statistics')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'cache stats', async (ctx) => {
            const cache = requireCache(ctx);
            const stats = await cache.stats();
            if (ctx.options.json) {
                console.log(JSON.stringify({ dir: cache.getDir(), ...stats }, null, 2));
                return;
            }
            formatCacheStats(cache.getDir(), stats).forEach((line) => console.log(line));
        });
    });

const clearCommand = new Command('clear')
    .description('Remove every cache entry')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'cache clear', async (ctx) => {
            const removed = await requireCache(ctx).clear();
            ctx.logger.success(`Removed ${removed} cache files`);
        });
    });

const cleanupCommand = new Command('cleanup')
    .description('Remove expired and unreadable cache entries')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'cache cleanup', async (ctx) => {
            const removed = await requireCache(ctx).cleanup();
            ctx.logger.success(`Removed ${removed} expired cache files`);
        });
    });

export const cacheCommand = new Command('cache')
    .description('Inspect and clean the instance cache')
    .addCommand(statsCommand)
    .addCommand(clearCommand)
    .addCommand(cleanupCommand);
