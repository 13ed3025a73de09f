import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import type {
  AddressRequest,
  CreateCustomerRequest,
  GetCustomersRequest,
  UpdateCustomerRequest,
} from './customers.types';

export class GetCustomersQueryDto implements GetCustomersRequest {
  @IsOptional()
  @IsString()
  @MaxLength(20)
  pageIndex?: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  pageSize?: string;

  @IsOptional()
  @IsString()
  @MaxLength(60)
  sortField?: string;
}

export class AddressRequestDto implements AddressRequest {
  @IsOptional()
  @IsString()
  line1?: string;

  @IsOptional()
  @IsString()
  line2?: string | null;

  @IsOptional()
  @IsString()
  city?: string;

  @IsOptional()
  @IsString()
  state?: string | null;

  @IsOptional()
  @IsString()
  postalCode?: string;

  @IsOptional()
  @IsString()
  country?: string;
}

export class CreateCustomerRequestDto implements CreateCustomerRequest {
  @IsString()
  @MaxLength(500)
  fullName!: string;

  @IsString()
  @MaxLength(40)
  dateOfBirth!: string;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @ValidateNested({ each: true })
  @Type(() => AddressRequestDto)
  address?: AddressRequestDto[] | null;
}

export class UpdateCustomerRequestDto implements UpdateCustomerRequest {
  @IsInt()
  customerId!: number;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  fullName?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(40)
  dateOfBirth?: string | null;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @ValidateNested({ each: true })
  @Type(() => AddressRequestDto)
  address?: AddressRequestDto[] | null;
}
