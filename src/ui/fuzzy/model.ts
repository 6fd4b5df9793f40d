/**
 * ================================================================================
 * FINDER MODEL - Pure Picker State
 * ================================================================================
 *
 * Every operation returns a new model; nothing here touches the terminal.
 * The rendering loop in finder.ts feeds key presses through keyToAction()
 * and applyAction() and redraws visible().
 */

export type FinderStatus = 'active' | 'confirmed' | 'cancelled';

export interface FinderModelOptions<T> {
    rank: (items: T[], query: string) => T[];
    key: (item: T) => string;
    multi?: boolean;
    height?: number;
}

export interface VisibleRow<T> {
    item: T;
    index: number;
    current: boolean;
    selected: boolean;
}

interface ModelState<T> {
    items: T[];
    matches: T[];
    query: string;
    cursor: number;
    offset: number;
    selected: ReadonlySet<string>;
    status: FinderStatus;
}

export class FinderModel<T> {
    private constructor(
        private readonly state: ModelState<T>,
        private readonly options: Required<FinderModelOptions<T>>
    ) {}

    static create<T>(items: T[], options: FinderModelOptions<T>): FinderModel<T> {
        const resolved = { ...options, multi: options.multi ?? false, height: options.height ?? 10 };
        return new FinderModel({
            items,
            matches: resolved.rank(items, ''),
            query: '',
            cursor: 0,
            offset: 0,
            selected: new Set<string>(),
            status: 'active'
        }, resolved);
    }

    get items(): T[] { return this.state.items; }
    get matches(): T[] { return this.state.matches; }
    get query(): string { return this.state.query; }
    get cursor(): number { return this.state.cursor; }
    get offset(): number { return this.state.offset; }
    get status(): FinderStatus { return this.state.status; }
    get multi(): boolean { return this.options.multi; }
    get height(): number { return this.options.height; }
    get selectedCount(): number { return this.state.selected.size; }

    private with(patch: Partial<ModelState<T>>): FinderModel<T> {
        return new FinderModel({ ...this.state, ...patch }, this.options);
    }

    /**
     * Keep the cursor inside the matches and the viewport around the cursor.
     */
    private placed(cursor: number, matches: T[] = this.state.matches): Pick<ModelState<T>, 'cursor' | 'offset'> {
        const last = Math.max(0, matches.length - 1);
        const clamped = Math.min(Math.max(0, cursor), last);
        let offset = Math.min(this.state.offset, clamped);
        if (clamped >= offset + this.options.height) {
            offset = clamped - this.options.height + 1;
        }
        return { cursor: clamped, offset: Math.max(0, offset) };
    }

    private requery(query: string): FinderModel<T> {
        const matches = this.options.rank(this.state.items, query);
        return this.with({ query, matches, cursor: 0, offset: 0 });
    }

    withItems(items: T[]): FinderModel<T> {
        const matches = this.options.rank(items, this.state.query);
        return this.with({ items, matches, ...this.placed(this.state.cursor, matches) });
    }

    withHeight(height: number): FinderModel<T> {
        const resized = new FinderModel(this.state, { ...this.options, height: Math.max(1, height) });
        return resized.with(resized.placed(this.state.cursor));
    }

    type(text: string): FinderModel<T> {
        return this.requery(this.state.query + text);
    }

    backspace(): FinderModel<T> {
        if (!this.state.query) return this;
        return this.requery(this.state.query.slice(0, -1));
    }

    clearQuery(): FinderModel<T> {
        return this.requery('');
    }

    moveUp(): FinderModel<T> {
        return this.with(this.placed(this.state.cursor - 1));
    }

    moveDown(): FinderModel<T> {
        return this.with(this.placed(this.state.cursor + 1));
    }

    pageUp(): FinderModel<T> {
        return this.with(this.placed(this.state.cursor - this.options.height));
    }

    pageDown(): FinderModel<T> {
        return this.with(this.placed(this.state.cursor + this.options.height));
    }

    current(): T | undefined {
        return this.state.matches[this.state.cursor];
    }

    isSelected(item: T): boolean {
        return this.state.selected.has(this.options.key(item));
    }

    /**
     * Flip the current item in multi mode and move on to the next one.
     */
    toggle(): FinderModel<T> {
        const item = this.current();
        if (!this.options.multi || item === undefined) return this;

        const key = this.options.key(item);
        const selected = new Set(this.state.selected);
        if (selected.has(key)) {
            selected.delete(key);
        } else {
            selected.add(key);
        }
        return this.with({ selected, ...this.placed(this.state.cursor + 1) });
    }

    /**
     * No-op while there is nothing to return.
     */
    confirm(): FinderModel<T> {
        return this.result().length > 0 ? this.with({ status: 'confirmed' }) : this;
    }

    cancel(): FinderModel<T> {
        return this.with({ status: 'cancelled' });
    }

    /**
     * Chosen items: toggled ones in load order, else the current match.
     */
    result(): T[] {
        if (this.state.status === 'cancelled') return [];
        if (this.options.multi && this.state.selected.size > 0) {
            return this.state.items.filter((item) => this.state.selected.has(this.options.key(item)));
        }
        const item = this.current();
        return item === undefined ? [] : [item];
    }

    visible(): VisibleRow<T>[] {
        const { matches, offset, cursor } = this.state;
        return matches.slice(offset, offset + this.options.height).map((item, i) => ({
            item,
            index: offset + i,
            current: offset + i === cursor,
            selected: this.isSelected(item)
        }));
    }
}

/**
 * ================================================================================
 * KEY BINDINGS
 * ================================================================================
 */

export interface KeyPress {
    name?: string;
    sequence?: string;
    ctrl?: boolean;
    meta?: boolean;
}

export type FinderAction =
    | { type: 'type'; text: string }
    | { type: 'backspace' }
    | { type: 'clear' }
    | { type: 'up' }
    | { type: 'down' }
    | { type: 'pageUp' }
    | { type: 'pageDown' }
    | { type: 'toggle' }
    | { type: 'confirm' }
    | { type: 'cancel' };

/**
 * Map a readline keypress to a finder action, or null for keys without one.
 */
export function keyToAction(key: KeyPress, queryEmpty: boolean, multi: boolean): FinderAction | null {
    if (key.ctrl) {
        switch (key.name) {
            case 'c': return { type: 'cancel' };
            case 'p': return { type: 'up' };
            case 'n': return { type: 'down' };
            case 'u': return { type: 'clear' };
            default: return null;
        }
    }

    switch (key.name) {
        case 'up': return { type: 'up' };
        case 'down': return { type: 'down' };
        case 'pageup': return { type: 'pageUp' };
        case 'pagedown': return { type: 'pageDown' };
        case 'return':
        case 'enter': return { type: 'confirm' };
        case 'escape': return { type: 'cancel' };
        case 'backspace': return { type: 'backspace' };
        case 'space':
            return multi ? { type: 'toggle' } : { type: 'type', text: ' ' };
        case 'j':
            if (queryEmpty) return { type: 'down' };
            break;
        case 'k':
            if (queryEmpty) return { type: 'up' };
            break;
    }

    const text = key.sequence ?? '';
    if (!key.meta && text.length === 1 && text >= ' ' && text !== '\x7f') {
        return { type: 'type', text };
    }
    return null;
}

export function applyAction<T>(model: FinderModel<T>, action: FinderAction): FinderModel<T> {
    switch (action.type) {
        case 'type': return model.type(action.text);
        case 'backspace': return model.backspace();
        case 'clear': return model.clearQuery();
        case 'up': return model.moveUp();
        case 'down': return model.moveDown();
        case 'pageUp': return model.pageUp();
        case 'pageDown': return model.pageDown();
        case 'toggle': return model.toggle();
        case 'confirm': return model.confirm();
        case 'cancel': return model.cancel();
    }
}
