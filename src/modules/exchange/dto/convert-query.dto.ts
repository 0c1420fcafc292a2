import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEnum, IsNumber, Min } from 'class-validator';
import { Currency } from '../enums/currency.enum';

// Plain decimal notation only; blank, hex and other forms Number() accepts are rejected
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

const toCurrencyCode = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim().toUpperCase() : value);

const toAmount = ({ value }: { value: unknown }): unknown => {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    return Number(value.trim());
  }
  return value === undefined ? undefined : Number.NaN;
};

export class ConvertQueryDto {
  @ApiProperty({ enum: Currency, example: Currency.EUR, description: 'Source currency (ISO 4217)' })
  @Transform(toCurrencyCode)
  @IsEnum(Currency, { message: 'Unsupported currency code: $value' })
  from!: Currency;

  @ApiProperty({ enum: Currency, example: Currency.USD, description: 'Target currency (ISO 4217)' })
  @Transform(toCurrencyCode)
  @IsEnum(Currency, { message: 'Unsupported currency code: $value' })
  to!: Currency;

  @ApiProperty({ type: String, example: '100', description: 'Non-negative decimal amount' })
  @Transform(toAmount)
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'amount must be a finite number' })
  @Min(0)
  amount!: number;
}
