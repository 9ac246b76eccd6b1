import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { InstrumentService } from './instrument.service';
import { RegisterInstrumentDto } from './dto/register-instrument.dto';
import { InstrumentResponseDto } from './dto/instrument-response.dto';

@Controller('instruments')
export class InstrumentController {
  constructor(private readonly instrumentService: InstrumentService) {}

  /**
   * Registers an instrument's prices, corporate actions and lock dates.
   * Re-registering a code replaces it.
   *
   * POST /instruments
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  register(@Body() dto: RegisterInstrumentDto): InstrumentResponseDto {
    return this.instrumentService.register(dto);
  }

  /** GET /instruments */
  @Get()
  @HttpCode(HttpStatus.OK)
  getAll(): InstrumentResponseDto[] {
    return this.instrumentService.getAllInstruments();
  }

  /** GET /instruments/:code */
  @Get(':code')
  @HttpCode(HttpStatus.OK)
  getOne(@Param('code') code: string): InstrumentResponseDto {
    return this.instrumentService.getInstrument(code);
  }
}
