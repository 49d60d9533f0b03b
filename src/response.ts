// response.ts - the single structured response every command prints

import type { PreparationError } from './structured_error';

export const SUCCESS_CODE = 200;

export type CommandResponse =
    | { code: number; success: true; result: unknown }
    | { code: number; success: false; error: string };

export function successResponse(result: unknown): CommandResponse {
    return { code: SUCCESS_CODE, success: true, result };
}

export function failureResponse(err: PreparationError): CommandResponse {
    return { code: err.responseCode, success: false, error: err.message };
}

export function printResponse(response: CommandResponse): string {
    return JSON.stringify(response);
}
