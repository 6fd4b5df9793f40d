import { AutoScalingGroup, ClusterSummary, Instance, NodeGroup } from '../types';

/**
 * ================================================================================
 * SCREENS
 * ================================================================================
 */

export interface ListScreen<K extends string, T> {
    kind: K;
    items: T[];
    cursor: number;
    filter: string;
    searching: boolean;
    loaded: boolean;
}

export interface MenuScreen {
    kind: 'menu';
    cursor: number;
}

export type InstancesScreen = ListScreen<'instances', Instance>;
export type ClustersScreen = ListScreen<'clusters', ClusterSummary>;
export type AsgsScreen = ListScreen<'asgs', AutoScalingGroup>;

export interface ClusterDetailScreen extends ListScreen<'clusterDetail', NodeGroup> {
    clusterName: string;
}

export type ScaleField = 'min' | 'max' | 'desired';

export interface AsgScaleScreen {
    kind: 'asgScale';
    asg: AutoScalingGroup;
    fields: Record<ScaleField, string>;
    focus: ScaleField;
}

export type AnyListScreen = InstancesScreen | ClustersScreen | AsgsScreen | ClusterDetailScreen;
export type Screen = MenuScreen | AnyListScreen | AsgScaleScreen;

/**
 * ================================================================================
 * INTENTS - What to do after leaving the alternate screen
 * ================================================================================
 */

export type Intent =
    | { kind: 'session'; instanceId: string }
    | { kind: 'describeCluster'; clusterName: string }
    | { kind: 'scaleAsg'; name: string; min: number; max: number; desired: number };

/**
 * ================================================================================
 * STATE, EVENTS, COMMANDS
 * ================================================================================
 */

export interface TuiState {
    stack: Screen[];
    status: string;
    error: string | null;
    loading: boolean;
    intent: Intent | null;
    quitting: boolean;
    help: boolean;
    width: number;
    height: number;
    //? Ids of issued fetches; results with another id are stale
    nextFetchId: number;
    activeFetchId: number | null;
    frame: number;
    now: number;
}

export type FetchRequest =
    | { resource: 'instances' }
    | { resource: 'clusters' }
    | { resource: 'nodeGroups'; clusterName: string }
    | { resource: 'asgs' };

export type FetchData =
    | { resource: 'instances'; items: Instance[] }
    | { resource: 'clusters'; items: ClusterSummary[] }
    | { resource: 'nodeGroups'; clusterName: string; items: NodeGroup[] }
    | { resource: 'asgs'; items: AutoScalingGroup[] };

export interface TuiKey {
    name?: string;
    sequence?: string;
    ctrl?: boolean;
    meta?: boolean;
    shift?: boolean;
}

export type TuiEvent =
    | { type: 'key'; key: TuiKey }
    | { type: 'resize'; width: number; height: number }
    | { type: 'fetched'; id: number; data: FetchData }
    | { type: 'fetched'; id: number; error: string }
    | { type: 'tick'; now: number };

export type TuiCommand =
    | { type: 'none' }
    | { type: 'fetch'; id: number; request: FetchRequest }
    | { type: 'quit' };
