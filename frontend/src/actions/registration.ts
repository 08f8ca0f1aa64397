import { REGISTRATION_FAILED, registerMeter } from '../api/client';
import { ApiError } from '../api/http';
import type { DwellingType } from '../api/types';
import { METER_ID_HINT, isValidMeterId } from '../utils/validation';

export const AREA_REQUIRED = 'Please choose an area.';
export const DWELLING_REQUIRED = 'Please choose a dwelling type.';

export interface RegistrationForm {
  meterId: string;
  area: string;
  dwelling: DwellingType | '';
}

export type RegistrationOutcome =
  | { status: 'invalid'; message: string }
  | { status: 'registered'; message: string }
  | { status: 'failed'; message: string };

export function validateRegistration(form: RegistrationForm): string | null {
  if (!isValidMeterId(form.meterId)) return METER_ID_HINT;
  if (!form.area) return AREA_REQUIRED;
  if (!form.dwelling) return DWELLING_REQUIRED;
  return null;
}

export async function submitRegistration(form: RegistrationForm): Promise<RegistrationOutcome> {
  const problem = validateRegistration(form);
  if (problem !== null || !form.dwelling) {
    return { status: 'invalid', message: problem ?? DWELLING_REQUIRED };
  }

  try {
    const account = await registerMeter({
      meterId: form.meterId.trim(),
      area: form.area,
      dwelling: form.dwelling,
    });
    return {
      status: 'registered',
      message: `Meter ${account.meter_ID} registered at ${account.register_time}`,
    };
  } catch (err) {
    return { status: 'failed', message: err instanceof ApiError ? err.message : REGISTRATION_FAILED };
  }
}
