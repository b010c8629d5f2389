import { Controller, Get, Post, Put, Delete, Body, Param, HttpCode, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { ProjectsService, toProjectInfo } from '../../projects/projects.service';
import { CurrentUser, RequestUser } from '../decorators/current-user.decorator';
import { RequireRole } from '../decorators/require-role.decorator';
import { ProjectMemberGuard } from '../guards/project-member.guard';
import {
  ProjectSpecDto,
  ProjectDto,
  ProjectInfoDto,
  CreateProjectResponseDto,
  MessageResponseDto,
} from '../dto/projects.dto';
import { ParseProjectIdPipe } from '../pipes/parse-project-id.pipe';

@ApiTags('Projects')
@ApiBearerAuth()
@Controller()
export class ProjectsController {
  constructor(private readonly projectsService: ProjectsService) {}

  @Post('projects')
  @HttpCode(200)
  async create(@CurrentUser() user: RequestUser, @Body() body: ProjectSpecDto): Promise<CreateProjectResponseDto> {
    const project = await this.projectsService.create(user.id, body);
    return { project_id: project.id, project };
  }

  @Get('projects')
  async list(): Promise<ProjectDto[]> {
    return this.projectsService.list();
  }

  @Get('project/:id')
  async getById(@Param('id', ParseProjectIdPipe) id: number): Promise<ProjectDto> {
    return this.projectsService.getById(id);
  }

  @Get('project/:id/info')
  async getInfo(@Param('id', ParseProjectIdPipe) id: number): Promise<ProjectInfoDto> {
    return toProjectInfo(await this.projectsService.getById(id));
  }

  @Put('project/:id/info')
  async updateInfo(@Param('id', ParseProjectIdPipe) id: number, @Body() body: ProjectSpecDto): Promise<ProjectInfoDto> {
    return toProjectInfo(await this.projectsService.update(id, body));
  }

  @Delete('projects/:id')
  @RequireRole('owner')
  @UseGuards(ProjectMemberGuard)
  async remove(@Param('id', ParseProjectIdPipe) id: number): Promise<MessageResponseDto> {
    await this.projectsService.remove(id);
    return { message: 'Project deleted' };
  }
}
