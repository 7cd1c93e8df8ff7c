import { Response } from 'express';
import { z } from 'zod';

export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

interface PgErrorLike {
  code: string;
  constraint?: string;
}

const CONSTRAINT_MESSAGES: Record<string, string> = {
  contacts_unique_primary_idx: 'Company already has a primary contact',
  contacts_user_id_key: 'User is already linked to another contact',
  agents_user_id_key: 'User already has an agent profile',
  users_username_key: 'A user with that username already exists',
  objects_total_area_positive: 'Total area must be greater than 0',
  objects_floors_min: 'Floors must be at least 1',
  objects_latitude_range: 'Latitude must be between -90 and 90',
  objects_longitude_range: 'Longitude must be between -180 and 180',
  offers_areas_non_negative: 'Areas cannot be negative',
  offers_parent_not_self: 'An offer cannot be its own parent',
  contacts_company_id_fkey: 'Company does not exist',
  contacts_user_id_fkey: 'User does not exist',
  agents_company_id_fkey: 'Company does not exist',
  agents_user_id_fkey: 'User does not exist',
  objects_owner_id_fkey: 'Owner company does not exist',
  offers_object_id_fkey: 'Object does not exist',
  offers_parent_offer_id_fkey: 'Parent offer does not exist',
  offers_contact_person_id_fkey: 'Contact person does not exist',
  object_images_object_id_fkey: 'Object does not exist',
};

const FALLBACK_MESSAGES: Record<string, string> = {
  '23505': 'A record with these values already exists',
  '23503': 'Referenced record does not exist',
  '23514': 'Value violates a check constraint',
  '23502': 'A required field is missing',
  '22003': 'Numeric value is out of range',
};

const findPgError = (error: unknown): PgErrorLike | null => {
  let current: unknown = error;
  // Drivers may wrap the server error; walk the cause chain.
  for (let depth = 0; depth < 3 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string' && Object.hasOwn(FALLBACK_MESSAGES, current.code)) {
      const constraint = 'constraint' in current && typeof current.constraint === 'string' ? current.constraint : undefined;
      return { code: current.code, constraint };
    }
    current = 'cause' in current ? current.cause : null;
  }
  return null;
};

export const describeConstraintViolation = (error: unknown): { message: string; constraint?: string } | null => {
  const pgError = findPgError(error);
  if (!pgError) return null;

  const message = (pgError.constraint && CONSTRAINT_MESSAGES[pgError.constraint]) || FALLBACK_MESSAGES[pgError.code];
  return { message, constraint: pgError.constraint };
};

export const handleControllerError = (res: Response, error: unknown, fallbackMessage: string) => {
  if (error instanceof z.ZodError) {
    const [issue] = error.issues;
    return res.status(400).json({ message: issue.message, field: issue.path.join('.') });
  }

  if (error instanceof HttpError) {
    return res.status(error.status).json({ message: error.message });
  }

  const violation = describeConstraintViolation(error);
  if (violation) {
    return res.status(400).json(violation);
  }

  console.error(`❌ ${fallbackMessage}:`, error);
  return res.status(500).json({ message: fallbackMessage });
};
