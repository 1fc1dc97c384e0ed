// src/sessions/sessions.controller.ts
import { Body, Controller, Get, Param, Post, Put, Res } from '@nestjs/common';
import type { Response } from 'express';

import { withClientAbort } from '../advisor/client-abort';
import { ContextRequestDto, SessionMessageDto } from '../advisor/dto/business-context.dto';
import { AdvisorySessionService } from './advisory-session.service';

@Controller('advisor/sessions')
export class SessionsController {
  constructor(private readonly sessions: AdvisorySessionService) {}

  @Post()
  start(@Body() dto: ContextRequestDto, @Res({ passthrough: true }) res: Response) {
    return withClientAbort(res, (signal) => this.sessions.start(dto.context, signal));
  }

  @Put(':id/context')
  replaceContext(
    @Param('id') id: string,
    @Body() dto: ContextRequestDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    return withClientAbort(res, (signal) => this.sessions.replaceContext(id, dto.context, signal));
  }

  @Post(':id/messages')
  ask(
    @Param('id') id: string,
    @Body() dto: SessionMessageDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    return withClientAbort(res, (signal) => this.sessions.ask(id, dto.query, signal));
  }

  @Get(':id')
  get(@Param('id') id: string) {
    return this.sessions.get(id);
  }

  @Get(':id/applicable-laws')
  applicableLaws(@Param('id') id: string) {
    return this.sessions.applicableLaws(id);
  }
}
