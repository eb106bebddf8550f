import { IsBoolean, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';

export class CreateAssetDto {
  @IsString()
  @IsNotEmpty()
  @Matches(/^[A-Za-z0-9.^=\-]+$/, { message: 'symbol may only contain letters, digits and . ^ = -' })
  symbol!: string; // e.g. AAPL, BTC-USD, ^GSPC

  @IsString()
  @IsOptional()
  displayName?: string;

  @IsBoolean()
  @IsOptional()
  enabled?: boolean;
}
