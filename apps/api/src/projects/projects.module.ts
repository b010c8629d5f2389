import { Module } from '@nestjs/common';
import { ProjectsService } from './projects.service';
import { MembersModule } from '../members/members.module';

@Module({
  imports: [MembersModule],
  providers: [ProjectsService],
  exports: [ProjectsService],
})
export class ProjectsModule {}
