import { describe, expect, it } from 'vitest';
import { AutoScalingGroup, Instance } from '../types';
import { initialState, reduce, top, visibleIndexes } from './reducer';
import { TuiCommand, TuiEvent, TuiKey, TuiState } from './types';

const instance = (instanceId: string, name: string): Instance => ({
    instanceId,
    name,
    state: 'running',
    instanceType: 't3.micro',
    tags: { Name: name },
    securityGroups: []
});

const asg = (name: string): AutoScalingGroup => ({
    name,
    scaling: { min: 1, max: 4, desired: 2 },
    currentSize: 2,
    status: 'Active',
    availabilityZones: [],
    subnets: [],
    loadBalancerNames: [],
    targetGroupArns: [],
    instances: [],
    tags: {}
});

const key = (name: string, extra: Partial<TuiKey> = {}): TuiEvent => ({ type: 'key', key: { name, sequence: name.length === 1 ? name : undefined, ...extra } });
const ch = (c: string): TuiEvent => ({ type: 'key', key: { name: c.toLowerCase(), sequence: c } });
const ENTER = key('return');
const ESC = key('escape');

function play(state: TuiState, events: TuiEvent[]): [TuiState, TuiCommand[]] {
    const commands: TuiCommand[] = [];
    for (const event of events) {
        const [next, command] = reduce(state, event);
        state = next;
        commands.push(command);
    }
    return [state, commands];
}

function instancesLoaded(): TuiState {
    const [state] = play(initialState(), [
        ENTER,
        { type: 'fetched', id: 1, data: { resource: 'instances', items: [instance('i-1', 'db-1'), instance('i-2', 'web-1'), instance('i-3', 'web-2')] } }
    ]);
    return state;
}

describe('reduce', () => {
    it('should open the instance list from the menu and fetch it', () => {
        const [state, command] = reduce(initialState(), ENTER);

        expect(top(state).kind).toBe('instances');
        expect(state.loading).toBe(true);
        expect(state.status).toBe('Loading EC2 instances...');
        expect(command).toEqual({ type: 'fetch', id: 1, request: { resource: 'instances' } });
    });

    it('should ignore results of stale fetches', () => {
        const [opened] = reduce(initialState(), ENTER);
        const [state] = reduce(opened, { type: 'fetched', id: 7, data: { resource: 'instances', items: [instance('i-1', 'a')] } });

        expect(state).toBe(opened);
    });

    it('should record a session intent on Enter over an instance', () => {
        const [state, commands] = play(instancesLoaded(), [key('down'), ENTER]);

        expect(state.intent).toEqual({ kind: 'session', instanceId: 'i-2' });
        expect(state.quitting).toBe(true);
        expect(commands[1]).toEqual({ type: 'quit' });
    });

    it('should pop back to the menu and quit from it', () => {
        const [back] = play(instancesLoaded(), [ESC]);
        expect(top(back).kind).toBe('menu');

        const [done, command] = reduce(back, ESC);
        expect(done.quitting).toBe(true);
        expect(done.intent).toBeNull();
        expect(command).toEqual({ type: 'quit' });
    });

    it('should quit on q', () => {
        const [state, command] = reduce(instancesLoaded(), ch('q'));

        expect(state.quitting).toBe(true);
        expect(command.type).toBe('quit');
    });

    it('should jump to the ends with g and G', () => {
        const [bottom] = play(instancesLoaded(), [ch('G')]);
        const [first] = play(bottom, [ch('g')]);
        const screen = top(bottom);

        expect(screen.kind === 'instances' && screen.cursor).toBe(2);
        const firstScreen = top(first);
        expect(firstScreen.kind === 'instances' && firstScreen.cursor).toBe(0);
    });

    it('should filter while searching and keep the filter after Esc', () => {
        const [state] = play(instancesLoaded(), [ch('/'), ch('w'), ch('e'), ch('b'), key('backspace'), ch('b'), ESC]);
        const screen = top(state);

        expect(screen.kind).toBe('instances');
        if (screen.kind !== 'instances') return;
        expect(screen.filter).toBe('web');
        expect(screen.searching).toBe(false);
        expect(visibleIndexes(screen)).toEqual([1, 2]);
    });

    it('should type q into the search instead of quitting', () => {
        const [state] = play(instancesLoaded(), [ch('/'), ch('q')]);

        expect(state.quitting).toBe(false);
    });

    it('should refresh with a new fetch id', () => {
        const [state, command] = reduce(instancesLoaded(), ch('r'));

        expect(command).toEqual({ type: 'fetch', id: 2, request: { resource: 'instances' } });
        expect(state.activeFetchId).toBe(2);
    });

    it('should show fetch errors', () => {
        const [opened] = reduce(initialState(), ENTER);
        const [state] = reduce(opened, { type: 'fetched', id: 1, error: 'access denied' });

        expect(state.loading).toBe(false);
        expect(state.error).toBe('access denied');
    });

    it('should drill into a cluster and record a describe intent', () => {
        const [state, commands] = play(initialState(), [
            key('down'),
            ENTER,
            { type: 'fetched', id: 1, data: { resource: 'clusters', items: [{ name: 'prod', status: 'ACTIVE' }] } },
            ENTER,
            ch('d')
        ]);

        expect(commands[3]).toEqual({ type: 'fetch', id: 2, request: { resource: 'nodeGroups', clusterName: 'prod' } });
        expect(state.intent).toEqual({ kind: 'describeCluster', clusterName: 'prod' });
    });

    describe('ASG scale prompt', () => {
        function prompt(): TuiState {
            const [state] = play(initialState(), [
                key('down'),
                key('down'),
                ENTER,
                { type: 'fetched', id: 1, data: { resource: 'asgs', items: [asg('web-asg')] } },
                ENTER
            ]);
            return state;
        }

        it('should start on the desired field with the current values', () => {
            const screen = top(prompt());

            expect(screen).toMatchObject({ kind: 'asgScale', focus: 'desired', fields: { min: '1', max: '4', desired: '2' } });
        });

        it('should report an invalid triple on the error line', () => {
            const [state] = play(prompt(), [key('backspace'), ch('5'), ENTER]);

            expect(state.quitting).toBe(false);
            expect(state.error).toBe('desired capacity (5) must be between min size (1) and max size (4)');
        });

        it('should record the scale intent for a valid triple', () => {
            const [state] = play(prompt(), [key('tab'), key('tab'), key('backspace'), ch('6'), key('tab'), key('backspace'), ch('5'), ENTER]);

            expect(state.intent).toEqual({ kind: 'scaleAsg', name: 'web-asg', min: 1, max: 6, desired: 5 });
        });

        it('should require every field', () => {
            const [state] = play(prompt(), [key('backspace'), ENTER]);

            expect(state.error).toBe('desired value is required');
        });
    });

    it('should toggle the help overlay', () => {
        const [shown] = reduce(initialState(), ch('?'));
        const [hidden] = reduce(shown, key('down'));

        expect(shown.help).toBe(true);
        expect(hidden.help).toBe(false);
        expect(top(hidden)).toEqual({ kind: 'menu', cursor: 0 });
    });

    it('should track size and ticks', () => {
        const [state] = play(initialState(), [{ type: 'resize', width: 120, height: 40 }, { type: 'tick', now: 5000 }]);

        expect(state).toMatchObject({ width: 120, height: 40, now: 5000, frame: 1 });
    });

    it('should ignore events once quitting', () => {
        const [done] = reduce(initialState(), ESC);

        expect(reduce(done, ENTER)).toEqual([done, { type: 'none' }]);
    });
});
