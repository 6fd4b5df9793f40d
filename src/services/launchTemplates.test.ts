import { describe, expect, it, vi } from 'vitest';
import type { DescribeLaunchTemplateVersionsCommandInput, DescribeLaunchTemplateVersionsCommandOutput } from '@aws-sdk/client-ec2';
import { fakeAwsClient } from '../testing/fakeAws';
import { formatVersionForDisplay, LaunchTemplateService } from './launchTemplates';

const pages = () => vi.fn(async (input: DescribeLaunchTemplateVersionsCommandInput): Promise<DescribeLaunchTemplateVersionsCommandOutput> => {
    if (input.Versions) {
        return { $metadata: {}, LaunchTemplateVersions: [] };
    }
    return input.NextToken === 'next'
        ? { $metadata: {}, LaunchTemplateVersions: [{ LaunchTemplateId: 'lt-0abc', VersionNumber: 3, VersionDescription: 'bump ami' }] }
        : {
            $metadata: {},
            LaunchTemplateVersions: [
                { LaunchTemplateId: 'lt-0abc', VersionNumber: 1, DefaultVersion: true },
                { LaunchTemplateId: 'lt-0abc', VersionNumber: 2, LaunchTemplateData: { InstanceType: 'm5.large' } }
            ],
            NextToken: 'next'
        };
});

describe('LaunchTemplateService', () => {
    it('should list every page newest first', async () => {
        const client = fakeAwsClient({ ec2: { describeLaunchTemplateVersions: pages() } });

        const versions = await new LaunchTemplateService(client).listVersions('lt-0abc');

        expect(versions.map((v) => v.versionNumber)).toEqual([3, 2, 1]);
        expect(versions[1].instanceType).toBe('m5.large');
    });

    it('should report a missing version as not found', async () => {
        const client = fakeAwsClient({ ec2: { describeLaunchTemplateVersions: pages() } });

        await expect(new LaunchTemplateService(client).getVersion('lt-0abc', '9')).rejects.toMatchObject({
            kind: 'NotFound',
            message: 'launch template version 9 not found'
        });
    });
});

describe('formatVersionForDisplay', () => {
    it('should mark the default version and append descriptions', () => {
        expect(formatVersionForDisplay({ templateId: 'lt-0abc', versionNumber: 1, isDefault: true })).toBe('1 (Default)');
        expect(formatVersionForDisplay({ templateId: 'lt-0abc', versionNumber: 3, isDefault: false, description: 'bump ami' })).toBe('3 - bump ami');
    });
});
