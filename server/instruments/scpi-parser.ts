/**
 * SCPI Response Helpers
 *
 * Numeric coercion and error-queue formatting used by the simulator.
 */

import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';

export const NO_ERROR_RESPONSE = '+0,"No error"';

/** SYST:ERR?, :SYSTem:ERRor?, SYST:ERR:NEXT? ... in any case */
const ERROR_QUERY_PATTERN = /^:?SYST(?:EM)?:ERR(?:OR)?(?::NEXT)?\?$/i;

export interface ScpiError {
  code: number;
  message: string;
}

export const ScpiParser = {
  /**
   * Parse a numeric SCPI response.
   *
   * Unlike parseFloat, trailing units or garbage ("5V") are rejected, so that
   * a string only counts as a number when the whole of it is one.
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    const value = Number(trimmed);

    if (!Number.isFinite(value)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    return Ok(value);
  },

  /** Format an error-queue entry the way SYST:ERR? reports it */
  formatErrorResponse(error: ScpiError): string {
    if (error.code === 0) return NO_ERROR_RESPONSE;
    return `${error.code},"${error.message}"`;
  },

  /** True for any spelling of the error-status query */
  isErrorQuery(command: string): boolean {
    return ERROR_QUERY_PATTERN.test(command.trim());
  },
};
