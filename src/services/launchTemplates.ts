import type { LaunchTemplateVersion as SdkLaunchTemplateVersion } from '@aws-sdk/client-ec2';
import { AwsClient } from '../aws/awsClient';
import { LaunchTemplateVersion } from '../types';
import { AppError } from '../utils/errors';

export function toLaunchTemplateVersion(version: SdkLaunchTemplateVersion): LaunchTemplateVersion {
    return {
        templateId: version.LaunchTemplateId ?? '',
        templateName: version.LaunchTemplateName,
        versionNumber: version.VersionNumber ?? 0,
        description: version.VersionDescription || undefined,
        isDefault: version.DefaultVersion ?? false,
        createdAt: version.CreateTime,
        createdBy: version.CreatedBy,
        instanceType: version.LaunchTemplateData?.InstanceType,
        imageId: version.LaunchTemplateData?.ImageId
    };
}

/**
 * "3 (Default)" or "3", followed by " - description" when there is one.
 */
export function formatVersionForDisplay(version: LaunchTemplateVersion): string {
    const label = version.isDefault ? `${version.versionNumber} (Default)` : String(version.versionNumber);
    return version.description ? `${label} - ${version.description}` : label;
}

export class LaunchTemplateService {
    constructor(private readonly client: AwsClient) {}

    /**
     * Every version of a template, newest first.
     */
    async listVersions(templateId: string, signal?: AbortSignal): Promise<LaunchTemplateVersion[]> {
        const versions: LaunchTemplateVersion[] = [];
        let nextToken: string | undefined;
        do {
            const token = nextToken;
            const page = await this.client.call('DescribeLaunchTemplateVersions', () =>
                this.client.services.ec2.describeLaunchTemplateVersions({ LaunchTemplateId: templateId, NextToken: token }), { signal });
            versions.push(...(page.LaunchTemplateVersions ?? []).map(toLaunchTemplateVersion));
            nextToken = page.NextToken;
        } while (nextToken);

        return versions.sort((a, b) => b.versionNumber - a.versionNumber);
    }

    async getVersion(templateId: string, version: string, signal?: AbortSignal): Promise<LaunchTemplateVersion> {
        const output = await this.client.call('DescribeLaunchTemplateVersions', () =>
            this.client.services.ec2.describeLaunchTemplateVersions({ LaunchTemplateId: templateId, Versions: [version] }), { signal });
        const found = output.LaunchTemplateVersions?.[0];
        if (!found) {
            throw new AppError('NotFound', `launch template version ${version} not found`);
        }
        return toLaunchTemplateVersion(found);
    }
}
