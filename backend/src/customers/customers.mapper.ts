import { ageOn } from '../shared/calendar';
import type {
  AddressDto,
  AddressRecord,
  CustomerDto,
  CustomerRecord,
  CustomerSort,
  NewCustomerRecord,
  PageResult,
  Paging,
} from './customers.types';

export interface ValidatedCustomerFields {
  fullName: string;
  dateOfBirth: string;
  address: AddressRecord[];
}

export function toNewCustomerRecord(
  fields: ValidatedCustomerFields,
  now: Date,
): NewCustomerRecord {
  return {
    fullName: fields.fullName,
    dateOfBirth: fields.dateOfBirth,
    age: ageOn(fields.dateOfBirth, now),
    address: fields.address.map(copyAddress),
  };
}

/** The age is taken on `now`, not from the stored column. */
export function toCustomerDto(record: CustomerRecord, now: Date): CustomerDto {
  return {
    customerId: record.customerId,
    fullName: record.fullName,
    dateOfBirth: record.dateOfBirth,
    age: ageOn(record.dateOfBirth, now),
    address: record.address.map(toAddressDto),
    ...(record.createdAt ? { createdAt: record.createdAt } : {}),
    ...(record.updatedAt ? { updatedAt: record.updatedAt } : {}),
  };
}

export function toAddressDto(address: AddressRecord): AddressDto {
  return copyAddress(address);
}

export function copyAddress(address: AddressRecord): AddressRecord {
  return {
    line1: address.line1,
    ...(address.line2 ? { line2: address.line2 } : {}),
    city: address.city,
    ...(address.state ? { state: address.state } : {}),
    postalCode: address.postalCode,
    country: address.country,
  };
}

export function sameAddresses(
  left: readonly AddressRecord[],
  right: readonly AddressRecord[],
): boolean {
  if (left.length !== right.length) {
    return false;
  }
  return left.every((address, index) => {
    const other = right[index];
    return (
      other !== undefined &&
      address.line1 === other.line1 &&
      (address.line2 ?? '') === (other.line2 ?? '') &&
      address.city === other.city &&
      (address.state ?? '') === (other.state ?? '') &&
      address.postalCode === other.postalCode &&
      address.country === other.country
    );
  });
}

function compareBy(sort: CustomerSort) {
  const factor = sort.direction === 'desc' ? -1 : 1;
  return (a: CustomerRecord, b: CustomerRecord): number => {
    const left = a[sort.field];
    const right = b[sort.field];
    const order =
      typeof left === 'number' && typeof right === 'number'
        ? left - right
        : String(left).localeCompare(String(right));
    return order * factor || a.customerId - b.customerId;
  };
}

/**
 * Sorts and slices the whole collection in memory. Page numbers are 1-based;
 * a page past the end is empty. Ages are taken on `now` before sorting.
 */
export function toCustomerPage(
  records: readonly CustomerRecord[],
  paging: Paging,
  sort: CustomerSort,
  now: Date,
): PageResult<CustomerDto> {
  const totalRecords = records.length;
  const startIndex = (paging.pageIndex - 1) * paging.pageSize;
  const items = records
    .map((record) => ({ ...record, age: ageOn(record.dateOfBirth, now) }))
    .sort(compareBy(sort))
    .slice(startIndex, startIndex + paging.pageSize)
    .map((record) => toCustomerDto(record, now));
  return {
    items,
    pageIndex: paging.pageIndex,
    pageSize: paging.pageSize,
    totalRecords,
    totalPages: Math.ceil(totalRecords / paging.pageSize),
  };
}
