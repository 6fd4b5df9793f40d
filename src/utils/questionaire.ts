/**
 * ================================================================================
 * QUESTIONNAIRE UTILITY - Interactive Prompts for Mutating Commands
 * ================================================================================
 *
 * inquirer prompts used before an operation changes infrastructure:
 * • Scaling values - asks only for the desired count when it was not given
 * • Confirmation - shows the before/after triple and waits for a yes
 *
 * //? Values already given on the command line are never asked for again
 * //! Non-interactive stdin must pass --skip-confirm and every required value
 */

import inquirer from 'inquirer';
import { ScalingTriple, ScalingUpdate } from '../types';
import { AppError } from './errors';
import { getLogger } from './logger';
import { parseCount } from './validation';

export type PromptFn = (questions: inquirer.QuestionCollection) => Promise<inquirer.Answers>;

const inquirerPrompt: PromptFn = (questions) => inquirer.prompt(questions);

/**
 * Scaling values given as flags; strings until parsed.
 */
export interface ScalingFlags {
    min?: string;
    max?: string;
    desired?: string;
}

function countValidator(label: string) {
    return (input: string): true | string => {
        if (!input.trim()) return `${label} is required`;
        try {
            const value = parseCount(input, label);
            return value !== undefined && value >= 0 ? true : `${label} cannot be negative`;
        } catch (err) {
            return err instanceof Error ? err.message : `invalid ${label}`;
        }
    };
}

export class Questionnaire {
    constructor(
        private readonly prompt: PromptFn = inquirerPrompt,
        private readonly interactive: () => boolean = () => process.stdin.isTTY === true
    ) {}

    /**
     * Build a scaling update from flags, asking for the desired count when absent.
     */
    async promptForScaling(label: string, current: ScalingTriple, flags: ScalingFlags): Promise<ScalingUpdate> {
        const min = parseCount(flags.min, 'min size');
        const max = parseCount(flags.max, 'max size');
        let desired = parseCount(flags.desired, label);

        if (desired === undefined) {
            if (!this.interactive()) {
                throw new AppError('Validation', '--desired is required when not running interactively');
            }
            const answers = await this.prompt([{
                type: 'input',
                name: 'desired',
                message: `New ${label} (current ${current.desired}, min ${min ?? current.min}, max ${max ?? current.max}):`,
                default: String(current.desired),
                validate: countValidator(label)
            }]);
            desired = parseCount(String(answers.desired), label);
        }

        if (desired === undefined) {
            throw new AppError('Validation', `${label} is required`);
        }
        getLogger().debug('Scaling values collected', { min, max, desired });
        return { min, max, desired };
    }

    /**
     * Ask a yes/no question; `skip` answers yes without asking.
     */
    async confirm(message: string, skip = false): Promise<boolean> {
        if (skip) return true;
        if (!this.interactive()) {
            throw new AppError('Validation', 'confirmation required: pass --skip-confirm when not running interactively');
        }
        const answers = await this.prompt([{
            type: 'confirm',
            name: 'confirmed',
            message,
            default: false
        }]);
        return answers.confirmed === true;
    }
}

/**
 * Describe a scaling change for the confirmation prompt.
 */
export function describeScalingChange(target: string, from: ScalingTriple, to: ScalingTriple): string {
    return `Scale ${target} from min=${from.min} desired=${from.desired} max=${from.max} `
        + `to min=${to.min} desired=${to.desired} max=${to.max}?`;
}

export const questionnaire = new Questionnaire();
