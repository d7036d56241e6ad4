import { FOREIGN_CALL_INPUT_COUNT } from '../protocol/constants';
import { ForeignCallInputs } from '../types';
import { invalidParams } from './errors';

const SLOT_NAMES = ['First', 'Second', 'Third', 'Fourth'] as const;

function slot(inputs: unknown[], index: number): unknown[] {
  const value = inputs[index];
  if (!Array.isArray(value)) {
    throw invalidParams(`${SLOT_NAMES[index]} input must be an array`);
  }
  return value;
}

/**
 * Pull the four positional arrays out of a foreign call's parameter object.
 * Elements are left undecoded.
 */
export function extractInputs(request: Record<string, unknown>): ForeignCallInputs {
  const inputs = request.inputs;
  if (!Array.isArray(inputs)) {
    throw invalidParams("Missing or invalid 'inputs'");
  }
  if (inputs.length !== FOREIGN_CALL_INPUT_COUNT) {
    throw invalidParams('Invalid input; requires 4 distinct inputs');
  }

  return {
    key: slot(inputs, 0),
    track: slot(inputs, 1),
    rangeA: slot(inputs, 2),
    rangeB: slot(inputs, 3)
  };
}
