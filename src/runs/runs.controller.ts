import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { RunsService } from './runs.service.js';
import { CreateRunBodySchema, type CreateRunBody } from './dto/create-run.dto.js';
import { SubmitTurnBodySchema, type SubmitTurnBody } from './dto/submit-turn.dto.js';

@Controller('v1/runs')
@UseGuards(AuthGuard)
export class RunsController {
  constructor(private readonly runsService: RunsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createRun(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(CreateRunBodySchema)) body: CreateRunBody,
  ) {
    return this.runsService.createRun(userId, body);
  }

  @Get()
  async getActiveRun(@UserId() userId: string) {
    return this.runsService.getActiveRun(userId);
  }

  @Get(':runId')
  async getRun(@Param('runId') runId: string, @UserId() userId: string) {
    return this.runsService.getRun(runId, userId);
  }

  @Post(':runId/battles')
  @HttpCode(HttpStatus.CREATED)
  async startBattle(@Param('runId') runId: string, @UserId() userId: string) {
    return this.runsService.startBattle(runId, userId);
  }

  @Post(':runId/turns')
  @HttpCode(HttpStatus.OK)
  async submitTurn(
    @Param('runId') runId: string,
    @UserId() userId: string,
    @Body(new ZodValidationPipe(SubmitTurnBodySchema)) body: SubmitTurnBody,
  ) {
    return this.runsService.submitTurn(runId, userId, body);
  }
}
