import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class TestProjectDto {
  @ApiProperty({ example: 1 })
  Id!: number;

  @ApiProperty({ example: 'Launch checklist' })
  Name!: string;
}

export class TestProjectInputDto {
  @ApiProperty({ description: 'Project name', example: 'Launch checklist' })
  @IsString()
  @IsNotEmpty()
  Name!: string;
}

export class DeleteTestProjectResponseDto {
  @ApiProperty({ example: 'Deleted successfully' })
  message!: string;
}
