import { IsBoolean, IsInt, IsNumber, IsOptional, IsString, Max, Min } from 'class-validator';

export class UpdateSettingsDto {
  @IsString()
  @IsOptional()
  universe?: string; // e.g. 'AAPL,MSFT,BTC-USD'

  @IsInt()
  @Min(1)
  @IsOptional()
  stochWindow?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  stochKSmooth?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  stochDSmooth?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  cciPeriod?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  dmiPeriod?: number;

  @IsInt()
  @Min(2)
  @IsOptional()
  slopePeriod?: number;

  @IsNumber()
  @Min(0)
  @Max(100)
  @IsOptional()
  adxThreshold?: number;

  @IsNumber()
  @Min(0)
  @IsOptional()
  slopeThreshold?: number;

  @IsBoolean()
  @IsOptional()
  signedAdx?: boolean;

  @IsInt()
  @Min(1)
  @Max(24)
  @IsOptional()
  synthesisCadenceHours?: number;
}
