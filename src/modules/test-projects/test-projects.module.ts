import { Module } from '@nestjs/common';
import { TestProjectRepository } from '../../persistence/repositories/test-project.repository';
import { TestProjectsController } from './test-projects.controller';

@Module({
  controllers: [TestProjectsController],
  providers: [TestProjectRepository],
})
export class TestProjectsModule {}
