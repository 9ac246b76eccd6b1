import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ISO_DATE } from '../../common/utils/date.util';

export class PricePointDto {
  @Matches(ISO_DATE)
  date!: string;

  @IsNumber()
  @IsPositive()
  netValue!: number;
}

// value < 0: split ratio (e.g. -2 doubles shares), value > 0: cash per share
export class CorporateActionDto {
  @Matches(ISO_DATE)
  date!: string;

  @IsNumber()
  value!: number;

  @IsOptional()
  @IsBoolean()
  reinvest?: boolean;
}

export class RedemptionFeeTierDto {
  @IsInt()
  @Min(0)
  maxDays!: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  rate!: number;
}

// Full price table and action calendar for one instrument
export class RegisterInstrumentDto {
  @IsString()
  @IsNotEmpty()
  code!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PricePointDto)
  prices!: PricePointDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CorporateActionDto)
  corporateActions?: CorporateActionDto[];

  @IsOptional()
  @IsArray()
  @Matches(ISO_DATE, { each: true })
  lockDates?: string[];

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  buyFeeRate?: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RedemptionFeeTierDto)
  redemptionFeeTiers?: RedemptionFeeTierDto[];
}
