import { IsOptional, IsString } from 'class-validator';

/**
 * Raw summary query. Values stay strings here; the request validation
 * service parses them so failures carry a precise reason.
 */
export class WeatherSummaryQueryDto {
  @IsOptional()
  @IsString()
  locations?: string;

  @IsOptional()
  @IsString()
  temperature?: string;

  @IsOptional()
  @IsString()
  unit?: string;
}
