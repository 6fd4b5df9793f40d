import { describe, it, expect } from 'vitest';
import { FeatureGates, parseFlag } from './features';

describe('FeatureGates', () => {
    it('should enable every gate by default', () => {
        const gates = new FeatureGates();

        expect(gates.summary()).toBe(
            'Feature Gates:\n  Metrics: enabled\n  Health Checks: enabled\n  Security: enabled\n  Validation: enabled'
        );
    });

    it('should read overrides from the environment', () => {
        const gates = FeatureGates.fromEnvironment({
            AWS_SSM_FEATURE_METRICS: 'false',
            AWS_SSM_FEATURE_HEALTH_CHECKS: 'OFF',
            AWS_SSM_FEATURE_VALIDATION: 'maybe'
        });

        expect(gates.isEnabled('metrics')).toBe(false);
        expect(gates.isEnabled('healthChecks')).toBe(false);
        expect(gates.isEnabled('security')).toBe(true);
        expect(gates.isEnabled('validation')).toBe(true);
    });

    it('should parse a comma separated gate list with aliases', () => {
        const gates = FeatureGates.parse('metrics=false, health_checks=no,unknown=true');

        expect(gates.isEnabled('metrics')).toBe(false);
        expect(gates.isEnabled('healthChecks')).toBe(false);
        expect(gates.isEnabled('validation')).toBe(true);
    });

    it('should reject malformed pairs', () => {
        expect(() => FeatureGates.parse('metrics')).toThrow('invalid feature gate format: metrics');
        expect(() => FeatureGates.parse('metrics=perhaps')).toThrow('invalid value for feature gate metrics: perhaps');
    });

    it('should parse flag spellings', () => {
        expect(parseFlag('Yes')).toBe(true);
        expect(parseFlag('0')).toBe(false);
        expect(parseFlag(undefined)).toBeUndefined();
        expect(parseFlag('')).toBeUndefined();
    });
});
