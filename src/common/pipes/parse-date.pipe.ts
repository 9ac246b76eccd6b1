import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { toDate } from '../utils/date.util';

// Optional `YYYY-MM-DD` query parameter -> UTC-midnight Date
@Injectable()
export class ParseOptionalDatePipe implements PipeTransform<string | undefined, Date | undefined> {
  transform(value: string | undefined): Date | undefined {
    if (value === undefined || value === '') {
      return undefined;
    }
    try {
      return toDate(value);
    } catch (error) {
      throw new BadRequestException(error instanceof Error ? error.message : String(error));
    }
  }
}
