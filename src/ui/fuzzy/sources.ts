import { DEFAULT_COLUMNS, DEFAULT_WEIGHTS, FieldWeights, InstanceColumn } from '../../config/types';
import { formatVersionForDisplay } from '../../services/launchTemplates';
import { AutoScalingGroup, ClusterSummary, Instance, LaunchTemplateVersion, NodeGroup } from '../../types';
import { fitWidth } from '../../utils/validation';
import { formatHeaderRow, formatInstanceRow } from './columns';
import { asgPreview, clusterPreview, instancePreview, launchTemplateVersionPreview, nodeGroupPreview } from './previews';
import { parseQuery } from './query';
import { defaultScorer, FuzzyScorer, rankInstances, rankText } from './scorer';

/**
 * How the finder shows, ranks and identifies one kind of item.
 */
export interface FinderSource<T> {
    key(item: T): string;
    row(item: T): string;
    rank(items: T[], query: string): T[];
    header?: string;
    preview?(item: T): string;
}

export interface InstanceSourceOptions {
    columns?: InstanceColumn[];
    weights?: FieldWeights;
    scorer?: FuzzyScorer;
}

export function instanceSource(options: InstanceSourceOptions = {}): FinderSource<Instance> {
    const columns = options.columns ?? DEFAULT_COLUMNS;
    const weights = options.weights ?? DEFAULT_WEIGHTS;
    const scorer = options.scorer ?? defaultScorer;
    return {
        key: (instance) => instance.instanceId,
        row: (instance) => formatInstanceRow(instance, columns),
        rank: (items, query) => rankInstances(items, parseQuery(query), weights, scorer),
        header: formatHeaderRow(columns),
        preview: (instance) => instancePreview(instance)
    };
}

/**
 * A source ranked on its row text alone.
 */
function textSource<T>(key: (item: T) => string, row: (item: T) => string, preview: (item: T) => string): FinderSource<T> {
    return {
        key,
        row,
        rank: (items, query) => rankText(items, row, query),
        preview
    };
}

export const clusterSource = (): FinderSource<ClusterSummary> => textSource(
    (c) => c.name,
    (c) => `${fitWidth(c.name, 40)} | ${fitWidth(c.status, 10)} | ${c.version ?? ''}`,
    clusterPreview
);

export const nodeGroupSource = (): FinderSource<NodeGroup> => textSource(
    (ng) => ng.name,
    (ng) => `${fitWidth(ng.name, 40)} | ${fitWidth(ng.status, 12)} | ${ng.scaling.min}/${ng.scaling.desired}/${ng.scaling.max}`,
    nodeGroupPreview
);

export const asgSource = (): FinderSource<AutoScalingGroup> => textSource(
    (asg) => asg.name,
    (asg) => `${fitWidth(asg.name, 50)} | ${asg.scaling.min}/${asg.scaling.desired}/${asg.scaling.max} | ${asg.currentSize} running`,
    asgPreview
);

export const launchTemplateVersionSource = (): FinderSource<LaunchTemplateVersion> => textSource(
    (v) => String(v.versionNumber),
    formatVersionForDisplay,
    launchTemplateVersionPreview
);
