import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class SubmitIntakeDto {
  @IsString()
  @IsNotEmpty({ message: 'full_name is required.' })
  @MaxLength(200)
  full_name!: string;

  @IsString()
  @IsNotEmpty({ message: 'phone_number is required.' })
  @MaxLength(32)
  phone_number!: string;
}
