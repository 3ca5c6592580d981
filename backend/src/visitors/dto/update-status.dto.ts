import { IsNotEmpty, IsString } from 'class-validator';

export class UpdateStatusDto {
  // 'active' or 'left', any casing; checked by VisitorsService.
  @IsString()
  @IsNotEmpty()
  status!: string;
}
