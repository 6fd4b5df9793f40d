/**
 * ================================================================================
 * FINDER - Interactive Fuzzy Picker
 * ================================================================================
 *
 * Draws the FinderModel on stderr and feeds it readline keypress events in raw
 * mode. Each frame erases the previous one (cursor up + clear to end), so the
 * picker never takes over the whole screen.
 *
 * LAYOUT:
 *   > query
 *     3/120  (1 selected)
 *     HEADER
 *   ▸ current row
 *     other rows
 *     preview of the current item
 */

import chalk from 'chalk';
import * as readline from 'readline';
import { Instance } from '../../types';
import { isCancelled } from '../../utils/errors';
import { getLogger, Logger } from '../../utils/logger';
import { FAVORITE_TAG, onlyFavorites } from './favorites';
import { Loader } from './loaders';
import { applyAction, FinderModel, keyToAction, KeyPress } from './model';
import { FinderSource, instanceSource, InstanceSourceOptions } from './sources';

export interface FinderInput extends NodeJS.ReadableStream {
    isTTY?: boolean;
    setRawMode?: (mode: boolean) => unknown;
}

export interface FinderOutput extends NodeJS.WritableStream {
    columns?: number;
    rows?: number;
}

export interface FinderIO {
    input?: FinderInput;
    output?: FinderOutput;
    logger?: Logger;
}

export interface FinderOptions {
    prompt?: string;
    multi?: boolean;
    noColor?: boolean;
    width?: number;             // 0 = terminal width
    height?: number;            // list rows; default from terminal height
    preview?: boolean;
    signal?: AbortSignal;
}

const PREVIEW_LINES = 12;
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

export class Finder {
    private readonly input: FinderInput;
    private readonly output: FinderOutput;
    private readonly logger: Logger;

    constructor(io: FinderIO = {}) {
        this.input = io.input ?? process.stdin;
        this.output = io.output ?? process.stderr;
        this.logger = io.logger ?? getLogger();
    }

    /**
     * Load items and let the user pick. Resolves with the chosen items, or an
     * empty list when the user cancels, the loader is cancelled or nothing loads.
     */
    async run<T>(loader: Loader<T>, source: FinderSource<T>, options: FinderOptions = {}): Promise<T[]> {
        try {
            const items = await this.load(loader, options);
            if (items.length === 0) return [];
            return await this.interact(items, source, options);
        } finally {
            await loader.close?.();
        }
    }

    private async load<T>(loader: Loader<T>, options: FinderOptions): Promise<T[]> {
        this.output.write('Loading...\n');
        try {
            return await loader.load(options.signal);
        } catch (err) {
            if (isCancelled(err)) {
                this.logger.debug('Picker load cancelled');
                return [];
            }
            throw err;
        } finally {
            this.output.write('\x1b[1A\x1b[J');
        }
    }

    private interact<T>(items: T[], source: FinderSource<T>, options: FinderOptions): Promise<T[]> {
        const painter = options.noColor ? new chalk.Instance({ level: 0 }) : chalk;
        const previewLines = options.preview && source.preview ? PREVIEW_LINES : 0;
        const height = options.height ?? Math.max(3, Math.min(15, (this.output.rows ?? 24) - 4 - previewLines));
        const width = options.width || this.output.columns || 80;

        let model = FinderModel.create(items, {
            rank: (all, query) => source.rank(all, query),
            key: (item) => source.key(item),
            multi: options.multi,
            height
        });
        let drawn = 0;

        const clip = (line: string): string => (line.length > width ? line.slice(0, width) : line);

        const render = (): void => {
            const lines: string[] = [];
            lines.push(`${painter.cyan(options.prompt ?? '>')} ${model.query}`);

            const selectedInfo = model.multi && model.selectedCount > 0 ? `  (${model.selectedCount} selected)` : '';
            lines.push(painter.dim(`  ${model.matches.length}/${model.items.length}${selectedInfo}`));
            if (source.header) lines.push(painter.bold(clip(`  ${source.header}`)));

            for (const row of model.visible()) {
                const mark = model.multi ? (row.selected ? '● ' : '○ ') : '';
                const text = clip(`${row.current ? '▸' : ' '} ${mark}${source.row(row.item)}`);
                lines.push(row.current ? painter.inverse(text) : text);
            }

            const current = model.current();
            if (previewLines > 0 && current !== undefined && source.preview) {
                const preview = source.preview(current).split('\n').slice(0, previewLines);
                lines.push('', ...preview.map((line, i) => (i === 0 ? painter.bold(clip(line)) : painter.dim(clip(line)))));
            }

            if (drawn > 0) this.output.write(`\x1b[${drawn}A\x1b[J`);
            this.output.write(lines.join('\n') + '\n');
            drawn = lines.length;
        };

        return new Promise<T[]>((resolve) => {
            const finish = (): void => {
                this.input.removeListener('keypress', onKey);
                options.signal?.removeEventListener('abort', onAbort);
                if (this.input.isTTY && this.input.setRawMode) this.input.setRawMode(false);
                this.input.pause();
                if (drawn > 0) this.output.write(`\x1b[${drawn}A\x1b[J`);
                this.output.write(SHOW_CURSOR);
                resolve(model.result());
            };

            const onKey = (_text: string | undefined, key: KeyPress | undefined): void => {
                const action = keyToAction(key ?? {}, model.query === '', model.multi);
                if (!action) return;
                model = applyAction(model, action);
                if (model.status === 'active') {
                    render();
                } else {
                    finish();
                }
            };

            const onAbort = (): void => {
                model = model.cancel();
                finish();
            };

            if (options.signal?.aborted) {
                resolve([]);
                return;
            }

            readline.emitKeypressEvents(this.input);
            if (this.input.isTTY && this.input.setRawMode) this.input.setRawMode(true);
            this.input.on('keypress', onKey);
            options.signal?.addEventListener('abort', onAbort, { once: true });
            this.input.resume();

            this.output.write(HIDE_CURSOR);
            render();
        });
    }
}

/**
 * ================================================================================
 * INSTANCE PICKER
 * ================================================================================
 */

export interface InstancePickerOptions extends FinderOptions, InstanceSourceOptions {
    maxItems?: number;
    favorites?: boolean;
}

/**
 * Wraps a loader with the favourites filter and the item cap.
 */
class LimitedLoader implements Loader<Instance> {
    constructor(
        private readonly inner: Loader<Instance>,
        private readonly options: InstancePickerOptions,
        private readonly logger: Logger
    ) {}

    async load(signal?: AbortSignal): Promise<Instance[]> {
        let items = await this.inner.load(signal);
        if (this.options.favorites) {
            items = onlyFavorites(items);
        }
        const max = this.options.maxItems;
        if (max !== undefined && items.length > max) {
            this.logger.warn(`Showing the first ${max} of ${items.length} instances`);
            items = items.slice(0, max);
        }
        return items;
    }

    async close(): Promise<void> {
        await this.inner.close?.();
    }
}

export function pickInstances(finder: Finder, loader: Loader<Instance>, options: InstancePickerOptions = {}, logger: Logger = getLogger()): Promise<Instance[]> {
    const prompt = options.prompt ?? (options.favorites ? `★ ${FAVORITE_TAG.key} >` : '>');
    return finder.run(new LimitedLoader(loader, options, logger), instanceSource(options), { preview: true, ...options, prompt });
}
