import { describe, expect, it } from 'vitest';
import {
    fitWidth,
    formatUptime,
    isValidInstanceId,
    parseCount,
    resolveScaling,
    validateCommand,
    validatePort,
    validateRegion
} from './validation';

describe('instance and region validation', () => {
    it('should accept short and long instance ids', () => {
        expect(isValidInstanceId('i-12345678')).toBe(true);
        expect(isValidInstanceId('i-0123456789abcdef0')).toBe(true);
    });

    it('should reject malformed instance ids', () => {
        expect(isValidInstanceId('i-1234567')).toBe(false);
        expect(isValidInstanceId('i-0123456789ABCDEF0')).toBe(false);
        expect(isValidInstanceId('web-1')).toBe(false);
    });

    it('should reject a region outside the AWS naming scheme', () => {
        expect(() => validateRegion('us-gov-west-1')).not.toThrow();
        expect(() => validateRegion('us-east-1; rm -rf /')).toThrow('invalid AWS region: us-east-1; rm -rf /');
    });
});

describe('validatePort', () => {
    it('should parse string ports', () => {
        expect(validatePort('8080')).toBe(8080);
    });

    it('should reject ports out of range', () => {
        expect(() => validatePort(65536)).toThrow('invalid port: 65536 (must be 1-65535)');
        expect(() => validatePort('abc', 'local port')).toThrow('invalid local port: abc (must be 1-65535)');
    });
});

describe('validateCommand', () => {
    it('should reject blank commands', () => {
        expect(() => validateCommand('   ')).toThrow('command cannot be empty');
    });

    it('should reject commands of 64 KiB or more', () => {
        expect(() => validateCommand('a'.repeat(64 * 1024 - 1))).not.toThrow();
        expect(() => validateCommand('a'.repeat(64 * 1024))).toThrow('command too long (limit 65536 bytes)');
    });
});

describe('resolveScaling', () => {
    const current = { min: 1, max: 5, desired: 2 };

    it('should keep current bounds that are not updated', () => {
        expect(resolveScaling(current, { desired: 4 })).toEqual({ min: 1, max: 5, desired: 4 });
    });

    it('should reject a negative min', () => {
        expect(() => resolveScaling(current, { min: -1, desired: 2 })).toThrow('min size cannot be negative');
    });

    it('should reject max below min', () => {
        expect(() => resolveScaling(current, { min: 4, max: 3, desired: 3 })).toThrow('max size (3) cannot be less than min size (4)');
    });

    it('should reject desired outside the bounds with the given label', () => {
        expect(() => resolveScaling(current, { desired: 6 })).toThrow('desired capacity (6) must be between min size (1) and max size (5)');
        expect(() => resolveScaling(current, { desired: 0 }, { desired: 'desired size' }))
            .toThrow('desired size (0) must be between min size (1) and max size (5)');
    });
});

describe('parseCount', () => {
    it('should pass undefined through and parse integers', () => {
        expect(parseCount(undefined, 'min')).toBeUndefined();
        expect(parseCount(' 3 ', 'min')).toBe(3);
        expect(parseCount('-1', 'min')).toBe(-1);
    });

    it('should reject non-integers', () => {
        expect(() => parseCount('2.5', 'desired')).toThrow('invalid desired: 2.5');
    });
});

describe('formatting', () => {
    it('should format uptime by its largest unit', () => {
        const launch = new Date('2024-01-01T00:00:00Z');
        expect(formatUptime(launch, new Date('2024-01-03T05:30:00Z'))).toBe('2d 5h 30m');
        expect(formatUptime(launch, new Date('2024-01-01T03:45:00Z'))).toBe('3h 45m');
        expect(formatUptime(launch, new Date('2024-01-01T00:25:10Z'))).toBe('25m');
    });

    it('should pad or truncate to the width', () => {
        expect(fitWidth('abc', 5)).toBe('abc  ');
        expect(fitWidth('abcdefgh', 6)).toBe('abc...');
        expect(fitWidth('abcdefgh', 2)).toBe('ab');
    });
});
