export interface AddressRecord {
  line1: string;
  line2?: string;
  city: string;
  state?: string;
  postalCode: string;
  country: string;
}

export interface CustomerRecord {
  customerId: number;
  fullName: string;
  dateOfBirth: string;
  age: number;
  address: AddressRecord[];
  createdAt?: string;
  updatedAt?: string;
}

export type NewCustomerRecord = Omit<
  CustomerRecord,
  'customerId' | 'createdAt' | 'updatedAt'
>;

export type AddressDto = AddressRecord;

export interface CustomerDto {
  customerId: number;
  fullName: string;
  dateOfBirth: string;
  age: number;
  address: AddressDto[];
  createdAt?: string;
  updatedAt?: string;
}

export interface PageResult<T> {
  items: T[];
  pageIndex: number;
  pageSize: number;
  totalRecords: number;
  totalPages: number;
}

export interface AddressRequest {
  line1?: string;
  line2?: string | null;
  city?: string;
  state?: string | null;
  postalCode?: string;
  country?: string;
}

export interface GetCustomersRequest {
  pageIndex?: string | number;
  pageSize?: string | number;
  sortField?: string;
}

export interface CreateCustomerRequest {
  fullName: string;
  dateOfBirth: string;
  address?: AddressRequest[] | null;
}

export interface UpdateCustomerRequest {
  customerId: number;
  fullName?: string | null;
  dateOfBirth?: string | null;
  address?: AddressRequest[] | null;
}

export interface DeleteCustomerResponse {
  customerId: number;
}

export const SORTABLE_CUSTOMER_FIELDS = [
  'customerId',
  'fullName',
  'dateOfBirth',
  'age',
] as const;

export type CustomerSortField = (typeof SORTABLE_CUSTOMER_FIELDS)[number];

export type SortDirection = 'asc' | 'desc';

export interface CustomerSort {
  field: CustomerSortField;
  direction: SortDirection;
}

export interface Paging {
  pageIndex: number;
  pageSize: number;
}
