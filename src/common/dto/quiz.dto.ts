import { IsString, IsNotEmpty, MaxLength } from 'class-validator';

export class AddQuestionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(1000)
  text!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  answer!: string;
}

export class CheckAnswerDto {
  // Any string is a valid candidate, empty or long; it just may not match.
  @IsString()
  answer!: string;
}

export class GrantEducatorDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  identity!: string;
}
