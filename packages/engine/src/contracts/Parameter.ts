/**
 * Parameter Contract
 *
 * A single scalar measurement rule. Parameters are immutable values:
 * the hard bounds are a plausibility gate, the tolerance grades how close
 * an accepted measurement is to the target.
 */

import { InvalidParameterError } from "../errors/TaxonomyError.js";

/**
 * Immutable measurement rule.
 */
export interface Parameter {
    /** Unique key within a class */
    readonly name: string;

    /** Representative (ideal) measurement */
    readonly targetValue: number;

    /** Hard lower acceptance bound */
    readonly minThreshold: number;

    /** Hard upper acceptance bound */
    readonly maxThreshold: number;

    /** Distance from target at which the score reaches 0. Always > 0. */
    readonly tolerance: number;

    /** Relative contribution to aggregate confidence. Always >= 0. */
    readonly weight: number;

    /** Unit of measurement. Metadata only. */
    readonly unit: string;
}

/**
 * Fields accepted when creating a parameter. Weight defaults to 1, unit to "mm".
 */
export interface ParameterInput {
    readonly name: string;
    readonly targetValue: number;
    readonly minThreshold: number;
    readonly maxThreshold: number;
    readonly tolerance: number;
    readonly weight?: number;
    readonly unit?: string;
}

export const DEFAULT_PARAMETER_UNIT = "mm";

/**
 * Create a validated, frozen Parameter.
 *
 * @param input - Parameter fields
 * @param classId - Owning class, used only for error context
 * @throws InvalidParameterError if any invariant is violated
 */
export function createParameter(input: ParameterInput, classId?: string): Parameter {
    const name = input.name;
    const weight = input.weight ?? 1.0;

    if (typeof name !== "string" || name.trim().length === 0) {
        throw new InvalidParameterError(String(name), "name must be a non-empty string", classId);
    }

    const numericFields: Array<[string, number]> = [
        ["targetValue", input.targetValue],
        ["minThreshold", input.minThreshold],
        ["maxThreshold", input.maxThreshold],
        ["tolerance", input.tolerance],
        ["weight", weight],
    ];

    for (const [field, value] of numericFields) {
        if (typeof value !== "number" || !Number.isFinite(value)) {
            throw new InvalidParameterError(name, `${field} must be a finite number`, classId);
        }
    }

    if (input.minThreshold > input.targetValue || input.targetValue > input.maxThreshold) {
        throw new InvalidParameterError(
            name,
            `expected minThreshold <= targetValue <= maxThreshold, got ${input.minThreshold} / ${input.targetValue} / ${input.maxThreshold}`,
            classId
        );
    }

    if (input.tolerance <= 0) {
        throw new InvalidParameterError(name, `tolerance must be > 0, got ${input.tolerance}`, classId);
    }

    if (weight < 0) {
        throw new InvalidParameterError(name, `weight must be >= 0, got ${weight}`, classId);
    }

    const parameter: Parameter = {
        name,
        targetValue : input.targetValue,
        minThreshold: input.minThreshold,
        maxThreshold: input.maxThreshold,
        tolerance   : input.tolerance,
        weight,
        unit        : input.unit ?? DEFAULT_PARAMETER_UNIT,
    };

    return Object.freeze(parameter);
}

/**
 * Check the hard acceptance bounds.
 */
export function isWithinBounds(parameter: Parameter, observed: number): boolean {
    return parameter.minThreshold <= observed && observed <= parameter.maxThreshold;
}

/**
 * Score one observation against a parameter.
 *
 * - missing observation: 0
 * - outside [min, max]: 0, however close to the target
 * - otherwise: 1 - |observed - target| / tolerance, clipped to [0, 1]
 *
 * @param parameter - The rule
 * @param observed - Measured value, undefined if the artifact lacks it
 * @returns Score in [0, 1]
 */
export function scoreParameter(parameter: Parameter, observed: number | undefined): number {
    if (observed === undefined || !Number.isFinite(observed)) {
        return 0.0;
    }

    if (!isWithinBounds(parameter, observed)) {
        return 0.0;
    }

    const distance = Math.abs(observed - parameter.targetValue) / parameter.tolerance;
    return Math.min(1.0, Math.max(0.0, 1.0 - distance));
}
