import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Put,
  ValidationPipe,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { TestProjectRepository } from '../../persistence/repositories/test-project.repository';
import {
  DeleteTestProjectResponseDto,
  TestProjectDto,
  TestProjectInputDto,
} from './dto/test-project.dto';

const PROJECT_NOT_FOUND = 'Project not found';

const idPipe = new ParseIntPipe({
  exceptionFactory: () => new BadRequestException('Invalid ID'),
});

const bodyPipe = new ValidationPipe({ whitelist: true });

@ApiTags('Test Projects')
@Controller('api/test')
export class TestProjectsController {
  constructor(private readonly repository: TestProjectRepository) {}

  @Get()
  @ApiOperation({ summary: 'Get all test projects' })
  @ApiResponse({ status: 200, type: [TestProjectDto] })
  findAll(): TestProjectDto[] {
    return this.repository.findAll();
  }

  @Post()
  @HttpCode(201)
  @ApiOperation({ summary: 'Create a new test project' })
  @ApiResponse({ status: 201, type: TestProjectDto })
  create(@Body(bodyPipe) dto: TestProjectInputDto): TestProjectDto {
    return this.repository.create(dto.Name);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get test project by ID' })
  @ApiResponse({ status: 200, type: TestProjectDto })
  @ApiResponse({ status: 404, description: PROJECT_NOT_FOUND })
  findOne(@Param('id', idPipe) id: number): TestProjectDto {
    const project = this.repository.findById(id);
    if (!project) {
      throw new NotFoundException(PROJECT_NOT_FOUND);
    }
    return project;
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update test project' })
  @ApiResponse({ status: 200, type: TestProjectDto })
  @ApiResponse({ status: 404, description: PROJECT_NOT_FOUND })
  update(
    @Param('id', idPipe) id: number,
    @Body(bodyPipe) dto: TestProjectInputDto,
  ): TestProjectDto {
    if (!this.repository.update(id, dto.Name)) {
      throw new NotFoundException(PROJECT_NOT_FOUND);
    }
    return { Id: id, Name: dto.Name };
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Delete test project' })
  @ApiResponse({ status: 200, type: DeleteTestProjectResponseDto })
  @ApiResponse({ status: 404, description: PROJECT_NOT_FOUND })
  remove(@Param('id', idPipe) id: number): DeleteTestProjectResponseDto {
    if (!this.repository.remove(id)) {
      throw new NotFoundException(PROJECT_NOT_FOUND);
    }
    return { message: 'Deleted successfully' };
  }
}
