import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, Min } from 'class-validator';

export class SeedRequestDto {
  @ApiPropertyOptional({
    description: 'PRNG seed for the synthetic snapshot; defaults to SEED_RANDOM_SEED',
    example: 42,
  })
  @IsOptional()
  @IsInt({ message: 'seed must be an integer' })
  @Min(0, { message: 'seed must not be negative' })
  seed?: number;
}
