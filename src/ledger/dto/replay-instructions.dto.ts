import { IsArray, IsNumber, IsOptional, Matches, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { ISO_DATE } from '../../common/utils/date.util';

// One instruction row. value > 0 buys for that much cash; a tenths-fraction
// digit of 5 (1000.05) marks the day's dividend as reinvested;
// -0.005 <= value < 0 redeems (-value / 0.005) of the holding;
// value < -0.005 redeems -value shares.
export class StatusInstructionDto {
  @Matches(ISO_DATE)
  date!: string;

  @IsNumber()
  value!: number;
}

// Full instruction history of a holding; replaces any earlier replay
export class ReplayInstructionsDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => StatusInstructionDto)
  instructions!: StatusInstructionDto[];

  @IsOptional()
  @Matches(ISO_DATE)
  endDate?: string;   // defaults to yesterday
}
