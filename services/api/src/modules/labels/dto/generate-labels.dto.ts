import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';

export class GenerateLabelsQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(120)
  @Matches(/^[^\\/"]+\.pdf$/i, { message: 'filename must be a plain name ending in .pdf' })
  filename?: string;
}
