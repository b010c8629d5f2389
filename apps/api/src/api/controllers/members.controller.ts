import { Controller, Get, Post, Param, Query, HttpCode, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { MembersService } from '../../members/members.service';
import { CurrentUser, RequestUser } from '../decorators/current-user.decorator';
import { RequireRole } from '../decorators/require-role.decorator';
import { ProjectMemberGuard } from '../guards/project-member.guard';
import { InviteQueryDto, MemberDto } from '../dto/members.dto';
import { MessageResponseDto } from '../dto/projects.dto';
import { ParseProjectIdPipe } from '../pipes/parse-project-id.pipe';

@ApiTags('Members')
@ApiBearerAuth()
@Controller('project/:id')
@UseGuards(ProjectMemberGuard)
export class MembersController {
  constructor(private readonly membersService: MembersService) {}

  @Get('members')
  async listMembers(@Param('id', ParseProjectIdPipe) id: number): Promise<MemberDto[]> {
    return this.membersService.membersOf(id);
  }

  @RequireRole('owner')
  @Post('invite')
  @HttpCode(200)
  async invite(
    @CurrentUser() user: RequestUser,
    @Param('id', ParseProjectIdPipe) id: number,
    @Query() query: InviteQueryDto,
  ): Promise<MessageResponseDto> {
    await this.membersService.invite(user.id, id, query.user_email);
    return { message: 'User invited' };
  }
}
