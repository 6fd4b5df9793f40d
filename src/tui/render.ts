/**
 * ================================================================================
 * TUI RENDER - State to Frame
 * ================================================================================
 *
 * Pure: takes the state and a chalk instance and returns the frame lines.
 * The driver clears the alternate screen and writes them.
 */

import chalk from 'chalk';
import { DEFAULT_COLUMNS } from '../config/types';
import { formatHeaderRow, formatInstanceRow } from '../ui/fuzzy/columns';
import { fitWidth } from '../utils/validation';
import { MENU_ITEMS, top, visibleIndexes } from './reducer';
import { AnyListScreen, AsgScaleScreen, MenuScreen, Screen, ScaleField, TuiState } from './types';

type Painter = chalk.Chalk;

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

const TITLES: Record<Screen['kind'], string> = {
    menu: 'ssm-ops',
    instances: 'EC2 Instances',
    clusters: 'EKS Clusters',
    clusterDetail: 'Node Groups',
    asgs: 'Auto Scaling Groups',
    asgScale: 'Scale'
};

//? Header, blank, footer, blank, status, error
const CHROME_LINES = 6;

function breadcrumb(state: TuiState): string {
    return state.stack
        .map((screen) => {
            if (screen.kind === 'clusterDetail') return screen.clusterName;
            if (screen.kind === 'asgScale') return `${TITLES.asgScale} ${screen.asg.name}`;
            return TITLES[screen.kind];
        })
        .join(' › ');
}

function renderMenu(screen: MenuScreen, p: Painter): string[] {
    return MENU_ITEMS.map((item, i) => {
        const current = i === screen.cursor;
        const title = current ? p.bold.cyan(`> ${item.title}`) : `  ${item.title}`;
        return `${title}${p.dim(` - ${item.description}`)}`;
    });
}

function listHeader(screen: AnyListScreen): string {
    switch (screen.kind) {
        case 'instances': return formatHeaderRow(DEFAULT_COLUMNS);
        case 'clusters': return `${fitWidth('NAME', 40)} | ${fitWidth('STATUS', 10)} | VERSION`;
        case 'clusterDetail': return `${fitWidth('NODE GROUP', 40)} | ${fitWidth('STATUS', 12)} | MIN/DESIRED/MAX`;
        case 'asgs': return `${fitWidth('NAME', 50)} | MIN/DESIRED/MAX | CURRENT`;
    }
}

export function listRow(screen: AnyListScreen, index: number): string {
    switch (screen.kind) {
        case 'instances':
            return formatInstanceRow(screen.items[index], DEFAULT_COLUMNS);
        case 'clusters': {
            const c = screen.items[index];
            return `${fitWidth(c.name, 40)} | ${fitWidth(c.status, 10)} | ${c.version ?? ''}`;
        }
        case 'clusterDetail': {
            const ng = screen.items[index];
            return `${fitWidth(ng.name, 40)} | ${fitWidth(ng.status, 12)} | ${ng.scaling.min}/${ng.scaling.desired}/${ng.scaling.max}`;
        }
        case 'asgs': {
            const asg = screen.items[index];
            const triple = `${asg.scaling.min}/${asg.scaling.desired}/${asg.scaling.max}`;
            return `${fitWidth(asg.name, 50)} | ${fitWidth(triple, 15)} | ${asg.currentSize}`;
        }
    }
}

function renderList(state: TuiState, screen: AnyListScreen, p: Painter, rows: number): string[] {
    const lines: string[] = [];
    if (screen.searching || screen.filter) {
        lines.push(`${p.yellow('/')}${screen.filter}${screen.searching ? '▏' : ''}`);
    }

    if (!screen.loaded) {
        lines.push(state.loading ? p.dim('  Loading...') : p.dim('  Nothing loaded (r to retry)'));
        return lines;
    }

    const visible = visibleIndexes(screen);
    if (visible.length === 0) {
        lines.push(p.dim(screen.items.length === 0 ? '  No items' : '  No matches'));
        return lines;
    }

    lines.push(p.bold(`  ${listHeader(screen)}`.slice(0, state.width)));
    const space = Math.max(1, rows - lines.length);
    const offset = Math.max(0, screen.cursor - space + 1);
    visible.slice(offset, offset + space).forEach((index, i) => {
        const current = offset + i === screen.cursor;
        const row = `${current ? '>' : ' '} ${listRow(screen, index)}`.slice(0, state.width);
        lines.push(current ? p.inverse(row) : row);
    });
    return lines;
}

function renderScale(screen: AsgScaleScreen, p: Painter): string[] {
    const { min, max, desired } = screen.asg.scaling;
    const field = (name: ScaleField, label: string): string => {
        const value = `[ ${screen.fields[name].padEnd(4)} ]`;
        return `  ${label.padEnd(10)}${screen.focus === name ? p.inverse(value) : value}`;
    };
    return [
        `  Current: min ${min}, desired ${desired}, max ${max} (${screen.asg.currentSize} running)`,
        '',
        field('min', 'Min'),
        field('max', 'Max'),
        field('desired', 'Desired'),
        '',
        p.dim('  Enter to apply after exit, Esc to go back')
    ];
}

const HELP_LINES = [
    'Keys',
    '',
    '  ↑/↓ j/k   move',
    '  g / G     first / last',
    '  Enter     select',
    '  /         search (Esc leaves search)',
    '  r         refresh',
    '  d         describe cluster (node group view)',
    '  Tab       next field (scale prompt)',
    '  Esc       back, quit from the menu',
    '  q         quit',
    '  ?         this help',
    '',
    'Press any key to close'
];

function footer(screen: Screen): string {
    switch (screen.kind) {
        case 'menu': return '↑/↓ move • Enter select • ? help • q quit';
        case 'asgScale': return 'digits edit • Tab next field • Enter apply • Esc back';
        case 'clusterDetail': return '↑/↓ move • / search • d describe • r refresh • Esc back • q quit';
        default: return '↑/↓ move • Enter select • / search • r refresh • Esc back • q quit';
    }
}

export function renderFrame(state: TuiState, p: Painter): string[] {
    const screen = top(state);
    const rows = Math.max(1, state.height - CHROME_LINES);

    let body: string[];
    if (state.help) {
        body = HELP_LINES;
    } else if (screen.kind === 'menu') {
        body = renderMenu(screen, p);
    } else if (screen.kind === 'asgScale') {
        body = renderScale(screen, p);
    } else {
        body = renderList(state, screen, p, rows);
    }

    const spinner = state.loading ? `${SPINNER_FRAMES[state.frame % SPINNER_FRAMES.length]} ` : '';
    const clock = new Date(state.now).toISOString().slice(11, 19);
    const status = `${spinner}${state.status}`;
    const statusLine = `${status}${' '.repeat(Math.max(1, state.width - status.length - clock.length))}${clock}`;

    return [
        p.bold(breadcrumb(state)),
        '',
        ...body.slice(0, rows),
        '',
        p.dim(footer(screen)),
        p.inverse(statusLine.slice(0, state.width)),
        state.error ? p.red(`✗ ${state.error}`) : ''
    ];
}
