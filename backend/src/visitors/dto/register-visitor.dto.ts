import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class RegisterVisitorDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  ic_number!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  license_plate!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  unit_number!: string;
}
