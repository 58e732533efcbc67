import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsNumber, IsOptional, Matches, Min } from 'class-validator';

export class SimulationRequestDto {
  @ApiPropertyOptional({
    description: 'Bundled scenario name; defaults to SIMULATION_SCENARIO',
    example: 'clinic-morning',
  })
  @IsOptional()
  @Matches(/^[a-z0-9][a-z0-9-]*$/, { message: 'scenario must be a kebab-case scenario name' })
  scenario?: string;

  @ApiPropertyOptional({
    description: 'Multiplier on scenario pauses; 0 runs without pausing',
    example: 0,
  })
  @IsOptional()
  @IsNumber({}, { message: 'pace must be a number' })
  @Min(0, { message: 'pace must not be negative' })
  pace?: number;
}
