import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { RepositoriesService } from './repositories.service';
import { LinkRepositoryDto, linkRepositorySchema } from '../../dto/link-repository.dto';
import { UpdateRepositoryDto, updateRepositorySchema } from '../../dto/update-repository.dto';
import { ZodValidationPipe } from '../../common/zod-validation.pipe';

@ApiTags('repositories')
@Controller()
export class RepositoriesController {
  constructor(private readonly repositoriesService: RepositoriesService) {}

  @Post('projects/:projectId/repositories')
  @ApiOperation({ summary: 'Link a repository to a project' })
  @ApiBody({ type: LinkRepositoryDto })
  async link(
    @Param('projectId', ParseIntPipe) projectId: number,
    @Body(new ZodValidationPipe(linkRepositorySchema)) dto: LinkRepositoryDto,
  ) {
    return this.repositoriesService.link(projectId, dto);
  }

  @Get('projects/:projectId/repositories')
  @ApiOperation({ summary: 'List active repositories of a project' })
  async findForProject(@Param('projectId', ParseIntPipe) projectId: number) {
    return this.repositoriesService.findActiveForProject(projectId);
  }

  @Patch('repositories/:id')
  @ApiOperation({ summary: 'Activate, deactivate or rename a repository mapping' })
  @ApiBody({ type: UpdateRepositoryDto })
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body(new ZodValidationPipe(updateRepositorySchema)) dto: UpdateRepositoryDto,
  ) {
    return this.repositoriesService.update(id, dto);
  }

  @Delete('repositories/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Unlink a repository' })
  async remove(@Param('id', ParseIntPipe) id: number) {
    await this.repositoriesService.unlink(id);
  }
}
