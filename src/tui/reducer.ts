/**
 * ================================================================================
 * TUI REDUCER - Pure State Transitions
 * ================================================================================
 *
 * reduce(state, event) returns the next state and at most one command for the
 * driver (fetch or quit). No I/O happens here; the driver owns the terminal,
 * timers and service calls.
 *
 * NAVIGATION:
 * • menu → instances | clusters → clusterDetail | asgs → asgScale
 * • Esc pops a screen, quitting from the menu
 * • Enter on an instance, `d` on a cluster and Enter on a valid scale prompt
 *   record an Intent and quit
 */

import { ScalingTriple } from '../types';
import { errorMessage } from '../utils/errors';
import { resolveScaling } from '../utils/validation';
import {
    AnyListScreen,
    AsgScaleScreen,
    FetchData,
    FetchRequest,
    Intent,
    MenuScreen,
    ScaleField,
    Screen,
    TuiCommand,
    TuiEvent,
    TuiKey,
    TuiState
} from './types';

export const MENU_ITEMS = [
    { title: 'EC2 Instances', description: 'Connect to instances through SSM', screen: 'instances' },
    { title: 'EKS Clusters', description: 'Browse clusters and node groups', screen: 'clusters' },
    { title: 'Auto Scaling Groups', description: 'Inspect and scale ASGs', screen: 'asgs' }
] as const;

const SCALE_FIELDS: ScaleField[] = ['min', 'max', 'desired'];

const NONE: TuiCommand = { type: 'none' };
const QUIT: TuiCommand = { type: 'quit' };

export type Transition = [TuiState, TuiCommand];

export function initialState(width = 80, height = 24, now = 0): TuiState {
    return {
        stack: [{ kind: 'menu', cursor: 0 }],
        status: 'Ready',
        error: null,
        loading: false,
        intent: null,
        quitting: false,
        help: false,
        width,
        height,
        nextFetchId: 1,
        activeFetchId: null,
        frame: 0,
        now
    };
}

/**
 * ================================================================================
 * HELPERS
 * ================================================================================
 */

export function top(state: TuiState): Screen {
    return state.stack[state.stack.length - 1];
}

function replaceTop(state: TuiState, screen: Screen): TuiState {
    return { ...state, stack: [...state.stack.slice(0, -1), screen] };
}

function isList(screen: Screen): screen is AnyListScreen {
    return screen.kind === 'instances' || screen.kind === 'clusters' || screen.kind === 'asgs' || screen.kind === 'clusterDetail';
}

/**
 * Text the `/` filter matches against.
 */
export function rowText(screen: AnyListScreen, index: number): string {
    switch (screen.kind) {
        case 'instances': {
            const i = screen.items[index];
            return `${i.name} ${i.instanceId} ${i.privateIp ?? ''} ${i.state}`;
        }
        case 'clusters':
            return `${screen.items[index].name} ${screen.items[index].status}`;
        case 'clusterDetail':
            return `${screen.items[index].name} ${screen.items[index].status}`;
        case 'asgs':
            return screen.items[index].name;
    }
}

/**
 * Indexes into screen.items that pass the filter, in item order.
 */
export function visibleIndexes(screen: AnyListScreen): number[] {
    const needle = screen.filter.toLowerCase();
    const indexes: number[] = [];
    for (let i = 0; i < screen.items.length; i++) {
        if (!needle || rowText(screen, i).toLowerCase().includes(needle)) indexes.push(i);
    }
    return indexes;
}

function requestFor(screen: Screen): FetchRequest | null {
    switch (screen.kind) {
        case 'instances': return { resource: 'instances' };
        case 'clusters': return { resource: 'clusters' };
        case 'asgs': return { resource: 'asgs' };
        case 'clusterDetail': return { resource: 'nodeGroups', clusterName: screen.clusterName };
        default: return null;
    }
}

const LOADING_STATUS: Record<FetchRequest['resource'], string> = {
    instances: 'Loading EC2 instances...',
    clusters: 'Loading EKS clusters...',
    nodeGroups: 'Loading node groups...',
    asgs: 'Loading Auto Scaling Groups...'
};

function fetch(state: TuiState, request: FetchRequest): Transition {
    const id = state.nextFetchId;
    return [
        { ...state, nextFetchId: id + 1, activeFetchId: id, loading: true, error: null, status: LOADING_STATUS[request.resource] },
        { type: 'fetch', id, request }
    ];
}

function push(state: TuiState, screen: Screen): Transition {
    const next: TuiState = { ...state, stack: [...state.stack, screen], error: null };
    const request = requestFor(screen);
    return request ? fetch(next, request) : [next, NONE];
}

function finish(state: TuiState, intent: Intent | null): Transition {
    return [{ ...state, intent, quitting: true, loading: false, activeFetchId: null }, QUIT];
}

function pop(state: TuiState): Transition {
    if (state.stack.length <= 1) return finish(state, null);
    //? Leaving a screen drops its pending fetch
    return [{ ...state, stack: state.stack.slice(0, -1), loading: false, activeFetchId: null, error: null, status: 'Ready' }, NONE];
}

const EMPTY_LIST = { cursor: 0, filter: '', searching: false, loaded: false };

function menuTarget(kind: typeof MENU_ITEMS[number]['screen']): Screen {
    switch (kind) {
        case 'instances': return { kind, items: [], ...EMPTY_LIST };
        case 'clusters': return { kind, items: [], ...EMPTY_LIST };
        case 'asgs': return { kind, items: [], ...EMPTY_LIST };
    }
}

const keyChar = (key: TuiKey): string => key.sequence ?? '';

const isPrintable = (key: TuiKey): boolean => {
    const ch = keyChar(key);
    return !key.ctrl && !key.meta && ch.length === 1 && ch >= ' ' && ch !== '\x7f';
};

/**
 * ================================================================================
 * KEY HANDLING
 * ================================================================================
 */

function moveCursor(cursor: number, count: number, delta: number): number {
    if (count === 0) return 0;
    return Math.min(Math.max(0, cursor + delta), count - 1);
}

function handleMenuKey(state: TuiState, screen: MenuScreen, key: TuiKey): Transition {
    switch (key.name) {
        case 'up':
        case 'k':
            return [replaceTop(state, { ...screen, cursor: moveCursor(screen.cursor, MENU_ITEMS.length, -1) }), NONE];
        case 'down':
        case 'j':
            return [replaceTop(state, { ...screen, cursor: moveCursor(screen.cursor, MENU_ITEMS.length, 1) }), NONE];
        case 'return':
        case 'enter': {
            const item = MENU_ITEMS[screen.cursor];
            return push(state, menuTarget(item.screen));
        }
        default:
            return [state, NONE];
    }
}

function handleSearchKey(state: TuiState, screen: AnyListScreen, key: TuiKey): Transition {
    switch (key.name) {
        case 'escape':
        case 'return':
        case 'enter':
            return [replaceTop(state, { ...screen, searching: false }), NONE];
        case 'backspace':
            return [replaceTop(state, { ...screen, filter: screen.filter.slice(0, -1), cursor: 0 }), NONE];
        case 'up':
        case 'down':
            return handleListKey(state, screen, key, true);
    }
    if (isPrintable(key)) {
        return [replaceTop(state, { ...screen, filter: screen.filter + keyChar(key), cursor: 0 }), NONE];
    }
    return [state, NONE];
}

function selectInList(state: TuiState, screen: AnyListScreen, index: number): Transition {
    switch (screen.kind) {
        case 'instances':
            return finish(state, { kind: 'session', instanceId: screen.items[index].instanceId });
        case 'clusters':
            return push(state, { kind: 'clusterDetail', items: [], clusterName: screen.items[index].name, ...EMPTY_LIST });
        case 'asgs': {
            const asg = screen.items[index];
            return push(state, {
                kind: 'asgScale',
                asg,
                fields: { min: String(asg.scaling.min), max: String(asg.scaling.max), desired: String(asg.scaling.desired) },
                focus: 'desired'
            });
        }
        case 'clusterDetail':
            return [state, NONE];
    }
}

function handleListKey(state: TuiState, screen: AnyListScreen, key: TuiKey, keepSearch = false): Transition {
    const visible = visibleIndexes(screen);
    const withCursor = (cursor: number): Transition => [replaceTop(state, { ...screen, cursor, searching: keepSearch && screen.searching }), NONE];
    const ch = keyChar(key);

    if (key.name === 'up' || ch === 'k') return withCursor(moveCursor(screen.cursor, visible.length, -1));
    if (key.name === 'down' || ch === 'j') return withCursor(moveCursor(screen.cursor, visible.length, 1));
    if (ch === 'g') return withCursor(0);
    if (ch === 'G') return withCursor(Math.max(0, visible.length - 1));

    if (key.name === 'return' || key.name === 'enter') {
        const index = visible[screen.cursor];
        return index === undefined ? [state, NONE] : selectInList(state, screen, index);
    }
    if (ch === '/') {
        return [replaceTop(state, { ...screen, searching: true }), NONE];
    }
    if (ch === 'r') {
        const request = requestFor(screen);
        return request ? fetch(state, request) : [state, NONE];
    }
    if (ch === 'd' && screen.kind === 'clusterDetail') {
        return finish(state, { kind: 'describeCluster', clusterName: screen.clusterName });
    }
    return [state, NONE];
}

function handleScaleKey(state: TuiState, screen: AsgScaleScreen, key: TuiKey): Transition {
    const ch = keyChar(key);

    if (key.name === 'tab') {
        const next = SCALE_FIELDS[(SCALE_FIELDS.indexOf(screen.focus) + (key.shift ? 2 : 1)) % SCALE_FIELDS.length];
        return [replaceTop(state, { ...screen, focus: next }), NONE];
    }
    if (key.name === 'backspace') {
        const fields = { ...screen.fields, [screen.focus]: screen.fields[screen.focus].slice(0, -1) };
        return [replaceTop(state, { ...screen, fields }), NONE];
    }
    if (/^[0-9]$/.test(ch)) {
        const current = screen.fields[screen.focus];
        //? A lone "0" is replaced rather than extended
        const value = current === '0' ? ch : current + ch;
        if (value.length > 6) return [state, NONE];
        return [replaceTop(state, { ...screen, fields: { ...screen.fields, [screen.focus]: value } }), NONE];
    }
    if (key.name === 'return' || key.name === 'enter') {
        return submitScale(state, screen);
    }
    return [state, NONE];
}

function submitScale(state: TuiState, screen: AsgScaleScreen): Transition {
    const parsed: Partial<ScalingTriple> = {};
    for (const field of SCALE_FIELDS) {
        const raw = screen.fields[field];
        if (raw === '') {
            return [{ ...state, error: `${field} value is required` }, NONE];
        }
        parsed[field] = Number(raw);
    }

    try {
        const triple = resolveScaling(screen.asg.scaling, { min: parsed.min, max: parsed.max, desired: parsed.desired ?? 0 });
        return finish(state, { kind: 'scaleAsg', name: screen.asg.name, ...triple });
    } catch (err) {
        return [{ ...state, error: errorMessage(err) }, NONE];
    }
}

function handleKey(state: TuiState, key: TuiKey): Transition {
    if (key.ctrl && key.name === 'c') return finish(state, null);

    if (state.help) {
        return [{ ...state, help: false }, NONE];
    }

    const screen = top(state);
    if (isList(screen) && screen.searching) {
        return handleSearchKey(state, screen, key);
    }

    const ch = keyChar(key);
    if (key.name === 'escape') return pop(state);
    if (ch === '?') return [{ ...state, help: true }, NONE];
    if (ch === 'q' && screen.kind !== 'asgScale') return finish(state, null);

    switch (screen.kind) {
        case 'menu':
            return handleMenuKey(state, screen, key);
        case 'asgScale':
            return handleScaleKey(state, screen, key);
        default:
            return handleListKey(state, screen, key);
    }
}

/**
 * ================================================================================
 * FETCH RESULTS
 * ================================================================================
 */

function applyData(state: TuiState, data: FetchData): TuiState {
    const stack = state.stack.map((screen): Screen => {
        if (data.resource === 'instances' && screen.kind === 'instances') {
            return { ...screen, items: data.items, loaded: true, cursor: 0 };
        }
        if (data.resource === 'clusters' && screen.kind === 'clusters') {
            return { ...screen, items: data.items, loaded: true, cursor: 0 };
        }
        if (data.resource === 'asgs' && screen.kind === 'asgs') {
            return { ...screen, items: data.items, loaded: true, cursor: 0 };
        }
        if (data.resource === 'nodeGroups' && screen.kind === 'clusterDetail' && screen.clusterName === data.clusterName) {
            return { ...screen, items: data.items, loaded: true, cursor: 0 };
        }
        return screen;
    });
    return { ...state, stack, status: `Loaded ${data.items.length} ${data.resource === 'nodeGroups' ? 'node groups' : data.resource}` };
}

/**
 * ================================================================================
 * REDUCE
 * ================================================================================
 */

export function reduce(state: TuiState, event: TuiEvent): Transition {
    if (state.quitting) return [state, NONE];

    switch (event.type) {
        case 'key':
            return handleKey(state, event.key);
        case 'resize':
            return [{ ...state, width: event.width, height: event.height }, NONE];
        case 'tick':
            return [{ ...state, now: event.now, frame: state.frame + 1 }, NONE];
        case 'fetched': {
            if (event.id !== state.activeFetchId) return [state, NONE];
            const settled: TuiState = { ...state, loading: false, activeFetchId: null };
            if ('error' in event) {
                return [{ ...settled, error: event.error, status: 'Load failed' }, NONE];
            }
            return [applyData(settled, event.data), NONE];
        }
    }
}
