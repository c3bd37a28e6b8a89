// 게임 설정 API: 시작 레벨 / 성장 방식 런타임 변경

import { Body, Controller, Get, Patch, UseGuards } from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  GameConfigPatchSchema,
  GameConfigService,
  type GameConfigPatch,
} from './game-config.service.js';

@Controller('v1/settings/game')
@UseGuards(AuthGuard)
export class GameSettingsController {
  constructor(private readonly configService: GameConfigService) {}

  @Get()
  getSettings() {
    return this.configService.getPublic();
  }

  /** 진행 중인 전투에는 영향 없음. 다음 모집/레벨업부터 반영 */
  @Patch()
  updateSettings(
    @Body(new ZodValidationPipe(GameConfigPatchSchema)) body: GameConfigPatch,
  ) {
    this.configService.update(body);
    return {
      message: 'Game settings updated. Changes apply to the next recruit or level-up.',
      ...this.configService.getPublic(),
    };
  }
}
