import { InstanceColumn } from '../../config/types';
import { Instance } from '../../types';
import { fitWidth } from '../../utils/validation';

export const COLUMN_WIDTHS: Record<InstanceColumn, number> = {
    'name': 30,
    'instance-id': 19,
    'private-ip': 15,
    'public-ip': 15,
    'state': 13,
    'type': 12,
    'az': 15
};

export const COLUMN_TITLES: Record<InstanceColumn, string> = {
    'name': 'NAME',
    'instance-id': 'INSTANCE ID',
    'private-ip': 'PRIVATE IP',
    'public-ip': 'PUBLIC IP',
    'state': 'STATE',
    'type': 'TYPE',
    'az': 'AZ'
};

export function columnValue(instance: Instance, column: InstanceColumn): string {
    switch (column) {
        case 'name':
            return instance.name || '(no name)';
        case 'instance-id':
            return instance.instanceId;
        case 'private-ip':
            return instance.privateIp ?? '';
        case 'public-ip':
            return instance.publicIp ?? '';
        case 'state':
            return instance.state;
        case 'type':
            return instance.instanceType;
        case 'az':
            return instance.availabilityZone ?? '';
    }
}

/**
 * One picker row: `name | instance-id | private-ip | state` by default.
 * The last column is not padded.
 */
export function formatInstanceRow(instance: Instance, columns: InstanceColumn[]): string {
    return columns
        .map((column, i) => {
            const value = columnValue(instance, column);
            return i === columns.length - 1 ? value : fitWidth(value, COLUMN_WIDTHS[column]);
        })
        .join(' | ');
}

export function formatHeaderRow(columns: InstanceColumn[]): string {
    return columns
        .map((column, i) => (i === columns.length - 1 ? COLUMN_TITLES[column] : fitWidth(COLUMN_TITLES[column], COLUMN_WIDTHS[column])))
        .join(' | ');
}
