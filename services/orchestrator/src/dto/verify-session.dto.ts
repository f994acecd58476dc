import { IsOptional, IsString, MaxLength } from "class-validator";

export class VerifySessionDto {
  @IsOptional()
  @IsString()
  @MaxLength(4000)
  instructions?: string;
}
