// ABOUTME: Validation for the numeric text inputs (render scale, iterations, Julia constant, sigil scale)
// ABOUTME: Invalid text is rejected and the field keeps its last valid value

import { Decimal } from "decimal.js";

import { ITERATION_BASE_RANGE, RENDER_SCALE_RANGE } from "../config";

export interface NumericFieldRule {
  label: string;
  integer: boolean;
  min?: number;
  max?: number;
}

export const RENDER_SCALE_FIELD: NumericFieldRule = {
  label: "render scale",
  integer: false,
  ...RENDER_SCALE_RANGE,
};

export const ITERATION_BASE_FIELD: NumericFieldRule = {
  label: "base max iterations",
  integer: true,
  ...ITERATION_BASE_RANGE,
};

export const SIGIL_SCALE_FIELD: NumericFieldRule = { label: "sigil scale", integer: false, min: 1, max: 500 };

export const JULIA_CONSTANT_FIELD: NumericFieldRule = { label: "Julia constant", integer: false };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parses field text and saturates it into the field's range. Returns null for text
 * that is not a number of the right kind, or that does not fit in a finite double
 * after clamping.
 */
export function parseNumericField(text: string, rule: NumericFieldRule): number | null {
  const trimmed = text.trim();
  const pattern = rule.integer ? INTEGER_PATTERN : REAL_PATTERN;
  if (!pattern.test(trimmed)) {
    return null;
  }

  let value = new Decimal(trimmed);
  if (rule.min !== undefined) value = Decimal.max(value, rule.min);
  if (rule.max !== undefined) value = Decimal.min(value, rule.max);

  const result = value.toNumber();
  return Number.isFinite(result) ? result : null;
}

export interface FieldSubmission {
  accepted: boolean;
  changed: boolean;
  value: number;
}

// Real-valued fields ignore changes below this
const CHANGE_EPSILON = 1e-5;

/**
 * A numeric input that remembers its last valid value.
 */
export class NumericField {
  constructor(
    readonly rule: NumericFieldRule,
    private value: number
  ) {}

  get current(): number {
    return this.value;
  }

  /** Text to show in the input: the last valid value */
  get text(): string {
    return String(this.value);
  }

  submit(text: string): FieldSubmission {
    const parsed = parseNumericField(text, this.rule);
    if (parsed === null) {
      console.warn(`Invalid input for ${this.rule.label}: "${text}"`);
      return { accepted: false, changed: false, value: this.value };
    }

    const changed = this.rule.integer ? parsed !== this.value : Math.abs(parsed - this.value) > CHANGE_EPSILON;
    if (changed) {
      this.value = parsed;
    }
    return { accepted: true, changed, value: this.value };
  }
}
