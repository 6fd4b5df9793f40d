/**
 * ================================================================================
 * FEATURE GATES - Runtime Feature Toggles
 * ================================================================================
 *
 * Built once at startup (from AWS_SSM_FEATURE_* variables) and threaded
 * through the application context. Tests build their own instance.
 *
 * GATES:
 * • metrics       - PerformanceMetrics and the periodic collector
 * • healthChecks  - `ssm-ops health`
 * • security      - reserved for transport hardening
 * • validation    - strict input validation (ids, ports, commands)
 */

import { AppError } from '../utils/errors';

export type FeatureName = 'metrics' | 'healthChecks' | 'security' | 'validation';

const FEATURE_NAMES: FeatureName[] = ['metrics', 'healthChecks', 'security', 'validation'];

const ENV_VARIABLES: Record<FeatureName, string> = {
    metrics: 'AWS_SSM_FEATURE_METRICS',
    healthChecks: 'AWS_SSM_FEATURE_HEALTH_CHECKS',
    security: 'AWS_SSM_FEATURE_SECURITY',
    validation: 'AWS_SSM_FEATURE_VALIDATION'
};

const NAME_ALIASES: Record<string, FeatureName> = {
    metrics: 'metrics',
    health_checks: 'healthChecks',
    healthchecks: 'healthChecks',
    'health-checks': 'healthChecks',
    security: 'security',
    validation: 'validation'
};

const LABELS: Record<FeatureName, string> = {
    metrics: 'Metrics',
    healthChecks: 'Health Checks',
    security: 'Security',
    validation: 'Validation'
};

/**
 * Parse a boolean flag value; undefined for anything unrecognised.
 */
export function parseFlag(value: string | undefined): boolean | undefined {
    if (value === undefined) return undefined;
    switch (value.trim().toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
        case 'on':
            return true;
        case 'false':
        case '0':
        case 'no':
        case 'off':
            return false;
        default:
            return undefined;
    }
}

export class FeatureGates {
    private gates: Record<FeatureName, boolean> = {
        metrics: true,
        healthChecks: true,
        security: true,
        validation: true
    };

    constructor(overrides: Partial<Record<FeatureName, boolean>> = {}) {
        this.gates = { ...this.gates, ...overrides };
    }

    static fromEnvironment(env: NodeJS.ProcessEnv = process.env): FeatureGates {
        const gates = new FeatureGates();
        for (const name of FEATURE_NAMES) {
            const flag = parseFlag(env[ENV_VARIABLES[name]]);
            if (flag !== undefined) {
                gates.set(name, flag);
            }
        }
        return gates;
    }

    /**
     * Parse "metrics=true,validation=false". Unknown names are ignored.
     */
    static parse(spec: string): FeatureGates {
        const gates = new FeatureGates();
        for (const pair of spec.split(',').map((p) => p.trim()).filter(Boolean)) {
            const eq = pair.indexOf('=');
            if (eq <= 0) {
                throw new AppError('Validation', `invalid feature gate format: ${pair}`);
            }
            const name = NAME_ALIASES[pair.slice(0, eq).trim().toLowerCase()];
            const flag = parseFlag(pair.slice(eq + 1));
            if (flag === undefined) {
                throw new AppError('Validation', `invalid value for feature gate ${pair.slice(0, eq).trim()}: ${pair.slice(eq + 1)}`);
            }
            if (name) {
                gates.set(name, flag);
            }
        }
        return gates;
    }

    isEnabled(name: FeatureName): boolean {
        return this.gates[name];
    }

    set(name: FeatureName, enabled: boolean): void {
        this.gates[name] = enabled;
    }

    summary(): string {
        const lines = FEATURE_NAMES.map((name) => `  ${LABELS[name]}: ${this.gates[name] ? 'enabled' : 'disabled'}`);
        return ['Feature Gates:', ...lines].join('\n');
    }
}
