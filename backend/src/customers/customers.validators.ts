import {
  badInput,
  isOk,
  notFound,
  ok,
  type Outcome,
} from '../shared/outcome';
import {
  calculateAge,
  compareCalendarDates,
  type CalendarDate,
  formatCalendarDate,
  parseCalendarDate,
  toCalendarDate,
} from '../shared/calendar';
import {
  SORTABLE_CUSTOMER_FIELDS,
  type AddressRecord,
  type AddressRequest,
  type CustomerRecord,
  type CustomerSort,
  type Paging,
} from './customers.types';

const FULL_NAME_MIN_LENGTH = 2;
const FULL_NAME_MAX_LENGTH = 100;
const FULL_NAME_PATTERN = /^[\p{L}\p{M}][\p{L}\p{M}'’ .-]*$/u;
const POSTAL_CODE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9 -]{1,9}$/;
const COUNTRY_PATTERN = /^[A-Za-z]{2}$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === 'string' && value.trim() === '')
  );
}

function readInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

export function validatePaging(
  rawPageIndex: unknown,
  rawPageSize: unknown,
  defaultPageSize: number,
  maximumPageSize: number,
): Outcome<Paging> {
  const pageIndex = isBlank(rawPageIndex) ? 1 : readInteger(rawPageIndex);
  if (pageIndex === null || pageIndex < 1) {
    return badInput('pageIndex must be an integer of at least 1.', 'pageIndex');
  }
  const pageSize = isBlank(rawPageSize)
    ? defaultPageSize
    : readInteger(rawPageSize);
  if (pageSize === null || pageSize < 1 || pageSize > maximumPageSize) {
    return badInput(
      `pageSize must be an integer between 1 and ${maximumPageSize}.`,
      'pageSize',
    );
  }
  return ok({ pageIndex, pageSize });
}

export function validateSortField(rawSortField: unknown): Outcome<CustomerSort> {
  if (isBlank(rawSortField)) {
    return ok({ field: 'customerId', direction: 'asc' });
  }
  if (typeof rawSortField !== 'string') {
    return badInput('sortField must be a string.', 'sortField');
  }
  const trimmed = rawSortField.trim();
  const descending = trimmed.startsWith('-');
  const name = (descending ? trimmed.slice(1) : trimmed).toLowerCase();
  const field = SORTABLE_CUSTOMER_FIELDS.find(
    (candidate) => candidate.toLowerCase() === name,
  );
  if (!field) {
    return badInput(
      `sortField must be one of ${SORTABLE_CUSTOMER_FIELDS.join(', ')}.`,
      'sortField',
    );
  }
  return ok({ field, direction: descending ? 'desc' : 'asc' });
}

export function validateIdentifier(
  rawId: unknown,
  field = 'customerId',
): Outcome<number> {
  const id = readInteger(rawId);
  if (id === null || id < 1) {
    return badInput(`${field} must be a positive integer.`, field);
  }
  return ok(id);
}

/** Route and body must name the same customer. */
export function validateIdentifierMatch(
  rawRouteId: unknown,
  bodyId: unknown,
): Outcome<number> {
  const route = validateIdentifier(rawRouteId);
  if (!isOk(route)) {
    return route;
  }
  const body = validateIdentifier(bodyId);
  if (!isOk(body)) {
    return body;
  }
  if (route.value !== body.value) {
    return badInput(
      `customerId ${body.value} in the body does not match customer ${route.value} in the route.`,
      'customerId',
    );
  }
  return route;
}

export function validateCustomerExists(
  record: CustomerRecord | null,
  customerId: number,
): Outcome<CustomerRecord> {
  if (!record || record.customerId !== customerId) {
    return notFound(`Customer ${customerId} not found.`);
  }
  return ok(record);
}

/** Trimmed, with inner whitespace runs collapsed to one space. */
export function normalizeFullName(rawFullName: string): string {
  return rawFullName.trim().replace(/\s+/g, ' ');
}

export function validateFullName(rawFullName: unknown): Outcome<string> {
  if (typeof rawFullName !== 'string' || isBlank(rawFullName)) {
    return badInput('fullName is required.', 'fullName');
  }
  const fullName = normalizeFullName(rawFullName);
  if (
    fullName.length < FULL_NAME_MIN_LENGTH ||
    fullName.length > FULL_NAME_MAX_LENGTH
  ) {
    return badInput(
      `fullName must be between ${FULL_NAME_MIN_LENGTH} and ${FULL_NAME_MAX_LENGTH} characters.`,
      'fullName',
    );
  }
  if (!FULL_NAME_PATTERN.test(fullName)) {
    return badInput(
      'fullName may only contain letters, spaces, apostrophes, hyphens and periods.',
      'fullName',
    );
  }
  return ok(fullName);
}

function parseDateOfBirth(rawDateOfBirth: unknown): Outcome<CalendarDate> {
  if (typeof rawDateOfBirth !== 'string' || isBlank(rawDateOfBirth)) {
    return badInput('dateOfBirth is required.', 'dateOfBirth');
  }
  const birth = parseCalendarDate(rawDateOfBirth);
  if (!birth) {
    return badInput(
      'dateOfBirth must be a valid date in YYYY-MM-DD format.',
      'dateOfBirth',
    );
  }
  return ok(birth);
}

/** Format check only: returns the canonical `YYYY-MM-DD` form. */
export function readDateOfBirth(rawDateOfBirth: unknown): Outcome<string> {
  const birth = parseDateOfBirth(rawDateOfBirth);
  return isOk(birth) ? ok(formatCalendarDate(birth.value)) : birth;
}

export function validateDateOfBirth(
  rawDateOfBirth: unknown,
  now: Date,
  maximumAgeYears: number,
): Outcome<string> {
  const birth = parseDateOfBirth(rawDateOfBirth);
  if (!isOk(birth)) {
    return birth;
  }
  const today = toCalendarDate(now);
  if (compareCalendarDates(birth.value, today) > 0) {
    return badInput('dateOfBirth cannot be in the future.', 'dateOfBirth');
  }
  if (calculateAge(birth.value, today) > maximumAgeYears) {
    return badInput(
      `dateOfBirth cannot be more than ${maximumAgeYears} years ago.`,
      'dateOfBirth',
    );
  }
  return ok(formatCalendarDate(birth.value));
}

function readOptionalText(
  value: unknown,
  field: string,
  maxLength: number,
): Outcome<string | undefined> {
  if (isBlank(value)) {
    return ok(undefined);
  }
  return readRequiredText(value, field, maxLength);
}

function readRequiredText(
  value: unknown,
  field: string,
  maxLength: number,
): Outcome<string> {
  if (typeof value !== 'string' || isBlank(value)) {
    return badInput(`${field} is required.`, field);
  }
  const text = value.trim();
  if (text.length > maxLength) {
    return badInput(`${field} must be at most ${maxLength} characters.`, field);
  }
  return ok(text);
}

export function validateAddress(
  address: AddressRequest | null | undefined,
  index: number,
): Outcome<AddressRecord> {
  const prefix = `address[${index}]`;
  if (!address || typeof address !== 'object') {
    return badInput(`${prefix} must be an object.`, prefix);
  }
  const line1 = readRequiredText(address.line1, `${prefix}.line1`, 200);
  if (!isOk(line1)) {
    return line1;
  }
  const line2 = readOptionalText(address.line2, `${prefix}.line2`, 200);
  if (!isOk(line2)) {
    return line2;
  }
  const city = readRequiredText(address.city, `${prefix}.city`, 100);
  if (!isOk(city)) {
    return city;
  }
  const state = readOptionalText(address.state, `${prefix}.state`, 100);
  if (!isOk(state)) {
    return state;
  }
  const postalCode = readRequiredText(
    address.postalCode,
    `${prefix}.postalCode`,
    10,
  );
  if (!isOk(postalCode)) {
    return postalCode;
  }
  if (!POSTAL_CODE_PATTERN.test(postalCode.value)) {
    return badInput(
      `${prefix}.postalCode must be 2 to 10 letters, digits, spaces or hyphens.`,
      `${prefix}.postalCode`,
    );
  }
  const country = readRequiredText(address.country, `${prefix}.country`, 60);
  if (!isOk(country)) {
    return country;
  }
  if (!COUNTRY_PATTERN.test(country.value)) {
    return badInput(
      `${prefix}.country must be a two-letter ISO 3166-1 code.`,
      `${prefix}.country`,
    );
  }

  return ok({
    line1: line1.value,
    ...(line2.value ? { line2: line2.value } : {}),
    city: city.value,
    ...(state.value ? { state: state.value } : {}),
    postalCode: postalCode.value.toUpperCase(),
    country: country.value.toUpperCase(),
  });
}

export function validateAddresses(
  addresses: ReadonlyArray<AddressRequest | null | undefined>,
): Outcome<AddressRecord[]> {
  const result: AddressRecord[] = [];
  for (const [index, address] of addresses.entries()) {
    const validated = validateAddress(address, index);
    if (!isOk(validated)) {
      return validated;
    }
    result.push(validated.value);
  }
  return ok(result);
}
