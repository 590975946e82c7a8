import { ApiProperty } from '@nestjs/swagger';
import { IsEnum } from 'class-validator';
import { Role } from '../../../common/enums/role.enum';

export class UpdateRoleDto {
  @ApiProperty({ description: 'New role', enum: Role, example: Role.ADMIN })
  @IsEnum(Role)
  role!: Role;
}
