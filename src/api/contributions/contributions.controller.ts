import {
  Controller,
  Get,
  NotFoundException,
  Param,
  ParseIntPipe,
  Patch,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ContributionsService } from './contributions.service';
import { GIT_PROVIDERS } from '../../database/entities';

@ApiTags('git-contributions')
@Controller('git-contributions')
export class ContributionsController {
  constructor(private readonly contributionsService: ContributionsService) {}

  @Get()
  @ApiOperation({ summary: 'List contributions, newest first' })
  @ApiQuery({ name: 'project_id', required: false, type: Number })
  @ApiQuery({ name: 'user_id', required: false, type: Number })
  @ApiQuery({ name: 'provider', required: false, enum: [...GIT_PROVIDERS] })
  async findAll(
    @Query('project_id', new ParseIntPipe({ optional: true })) projectId?: number,
    @Query('user_id', new ParseIntPipe({ optional: true })) userId?: number,
    @Query('provider') provider?: string,
  ) {
    return this.contributionsService.findAll({ projectId, userId, provider });
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one contribution' })
  async findOne(@Param('id', ParseIntPipe) id: number) {
    const contribution = await this.contributionsService.findOne(id);
    if (!contribution) throw new NotFoundException('Contribution not found');
    return contribution;
  }

  @Patch(':id/link-task')
  @ApiOperation({ summary: 'Link a contribution to a task, or unlink it when task_id is omitted' })
  @ApiQuery({ name: 'task_id', required: false, type: Number })
  async linkTask(
    @Param('id', ParseIntPipe) id: number,
    @Query('task_id', new ParseIntPipe({ optional: true })) taskId?: number,
  ) {
    return this.contributionsService.linkTask(id, taskId ?? null);
  }
}
