import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';

// Optional numeric query parameter
@Injectable()
export class ParseOptionalNumberPipe implements PipeTransform<string | undefined, number | undefined> {
  transform(value: string | undefined): number | undefined {
    if (value === undefined || value === '') {
      return undefined;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new BadRequestException(`"${value}" is not a number`);
    }
    return parsed;
  }
}
