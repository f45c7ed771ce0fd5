import { Transform, TransformFnParams } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

const TRUE_FLAGS = ['true', '1', 'on', 'yes'];
const FALSE_FLAGS = ['false', '0', 'off', 'no'];

// Multipart fields arrive as strings; anything unrecognised is left for IsBoolean to reject.
export function toBooleanFlag({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_FLAGS.includes(normalized)) {
    return true;
  }
  if (FALSE_FLAGS.includes(normalized)) {
    return false;
  }
  return value;
}

export class StickListOptionsDto {
  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  defectExclusion?: boolean;

  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  filldown?: boolean;

  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  diffReport?: boolean;
}
