import { describe, expect, it } from 'vitest';
import { DEFAULT_COLUMNS } from '../../config/types';
import { Instance } from '../../types';
import { formatHeaderRow, formatInstanceRow } from './columns';

const instance: Instance = {
    instanceId: 'i-0123456789abcdef0',
    name: 'a-very-long-instance-name-that-overflows',
    state: 'running',
    instanceType: 't3.micro',
    privateIp: '10.0.1.15',
    tags: {},
    securityGroups: []
};

describe('formatInstanceRow', () => {
    it('should pad and truncate every column but the last', () => {
        expect(formatInstanceRow(instance, DEFAULT_COLUMNS)).toBe(
            'a-very-long-instance-name-t... | i-0123456789abcdef0 | 10.0.1.15       | running'
        );
    });

    it('should label untagged instances', () => {
        expect(formatInstanceRow({ ...instance, name: '' }, ['name', 'state'])).toBe(`${'(no name)'.padEnd(30)} | running`);
    });

    it('should leave missing values blank', () => {
        expect(formatInstanceRow(instance, ['public-ip', 'type'])).toBe(`${''.padEnd(15)} | t3.micro`);
    });
});

describe('formatHeaderRow', () => {
    it('should title the columns at their widths', () => {
        expect(formatHeaderRow(['instance-id', 'state'])).toBe('INSTANCE ID         | STATE');
    });
});
