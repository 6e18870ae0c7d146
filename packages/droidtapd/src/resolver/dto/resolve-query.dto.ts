import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ResolveQueryDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  query!: string;
}
