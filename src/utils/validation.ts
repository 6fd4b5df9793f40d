/**
 * ================================================================================
 * VALIDATION UTILITY - Input Validation and Display Helpers
 * ================================================================================
 *
 * Checks applied to operator input before any AWS call is made, plus a few
 * formatting helpers shared by list output and previews.
 *
 * KEY FEATURES:
 * • Instance ID Validation - strict `i-` + 8..17 hex digits (validation gate)
 * • Port Validation - 1..65535
 * • Region Validation - guards the plugin argv
 * • Command Validation - non-empty, below 64 KiB (validation gate)
 * • Scaling Validation - 0 ≤ min ≤ desired ≤ max
 * • Uptime Formatting - "2d 5h 30m", "3h 45m", "25m"
 */

import { ScalingTriple, ScalingUpdate } from '../types';
import { AppError } from './errors';

/**
 * ================================================================
 * AWS IDENTIFIERS
 * ================================================================
 */

const INSTANCE_ID_PATTERN = /^i-[0-9a-f]{8,17}$/;
const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+[a-z]?$/;

export const MAX_COMMAND_BYTES = 64 * 1024;

export function isValidInstanceId(id: string): boolean {
    return INSTANCE_ID_PATTERN.test(id);
}

export function validateInstanceId(id: string): void {
    if (!isValidInstanceId(id)) {
        throw new AppError('Validation', `invalid instance ID: ${id}`);
    }
}

/**
 * //! The region ends up in the plugin's argv; reject anything else
 */
export function validateRegion(region: string): void {
    if (!REGION_PATTERN.test(region)) {
        throw new AppError('Validation', `invalid AWS region: ${region}`);
    }
}

/**
 * Parse and check a TCP port.
 */
export function validatePort(port: number | string, label = 'port'): number {
    const value = typeof port === 'number' ? port : Number(port.trim());
    if (!Number.isInteger(value) || value < 1 || value > 65535) {
        throw new AppError('Validation', `invalid ${label}: ${port} (must be 1-65535)`);
    }
    return value;
}

export function validateCommand(command: string): void {
    if (!command.trim()) {
        throw new AppError('Validation', 'command cannot be empty');
    }
    if (Buffer.byteLength(command, 'utf-8') >= MAX_COMMAND_BYTES) {
        throw new AppError('Validation', `command too long (limit ${MAX_COMMAND_BYTES} bytes)`);
    }
}

/**
 * ================================================================
 * SCALING
 * ================================================================
 */

export interface ScalingLabels {
    desired: string;    // "desired capacity" for ASGs, "desired size" for node groups
}

/**
 * Merge an update into the current triple and check 0 ≤ min ≤ desired ≤ max.
 * Unspecified bounds keep their current values.
 */
export function resolveScaling(current: ScalingTriple, update: ScalingUpdate, labels: ScalingLabels = { desired: 'desired capacity' }): ScalingTriple {
    const next: ScalingTriple = {
        min: update.min ?? current.min,
        max: update.max ?? current.max,
        desired: update.desired
    };

    for (const [name, value] of [['min size', next.min], ['max size', next.max], [labels.desired, next.desired]] as const) {
        if (!Number.isInteger(value)) {
            throw new AppError('Validation', `${name} must be a whole number`);
        }
    }
    if (next.min < 0) {
        throw new AppError('Validation', 'min size cannot be negative');
    }
    if (next.max < next.min) {
        throw new AppError('Validation', `max size (${next.max}) cannot be less than min size (${next.min})`);
    }
    if (next.desired < next.min || next.desired > next.max) {
        throw new AppError('Validation', `${labels.desired} (${next.desired}) must be between min size (${next.min}) and max size (${next.max})`);
    }
    return next;
}

/**
 * Parse a non-negative integer CLI value; undefined passes through.
 */
export function parseCount(value: string | undefined, label: string): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value.trim());
    if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
        throw new AppError('Validation', `invalid ${label}: ${value}`);
    }
    return parsed;
}

/**
 * ================================================================
 * DISPLAY FORMATTING UTILITIES
 * ================================================================
 */

/**
 * Format instance uptime in human-readable form.
 */
export function formatUptime(launchTime: Date, now: Date = new Date()): string {
    const uptimeMs = Math.max(0, now.getTime() - launchTime.getTime());

    const days = Math.floor(uptimeMs / (1000 * 60 * 60 * 24));
    const hours = Math.floor((uptimeMs % (1000 * 60 * 60 * 24)) / (1000 * 60 * 60));
    const minutes = Math.floor((uptimeMs % (1000 * 60 * 60)) / (1000 * 60));

    if (days > 0) {
        return `${days}d ${hours}h ${minutes}m`;
    } else if (hours > 0) {
        return `${hours}h ${minutes}m`;
    } else {
        return `${minutes}m`;
    }
}

/**
 * Pad or truncate to exactly `width` characters, ending truncated text with "...".
 */
export function fitWidth(text: string, width: number): string {
    if (width <= 0) return '';
    if (text.length > width) {
        return width <= 3 ? text.slice(0, width) : `${text.slice(0, width - 3)}...`;
    }
    return text.padEnd(width);
}
