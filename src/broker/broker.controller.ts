import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { CommandTimeoutException } from '../common/exceptions/broker.exceptions';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { PendingResult } from '../queue/interfaces/pending-result.interface';
import { BrokerService } from './broker.service';
import {
  ScanQueryDto,
  scanQuerySchema,
  SubmitCommandDto,
  submitCommandSchema,
  WaitCommandDto,
  waitCommandSchema,
} from './dto/command.dto';
import { BrokerStatus } from './interfaces/command-reply.interface';

@Controller()
export class BrokerController {
  constructor(private readonly brokerService: BrokerService) {}

  @Post('commands')
  @HttpCode(HttpStatus.ACCEPTED)
  async submit(
    @Body(new ZodValidationPipe(submitCommandSchema)) body: SubmitCommandDto,
  ): Promise<{ token: string }> {
    const token = await this.brokerService.submit(
      body.verb,
      body.board,
      body.target,
    );
    return { token };
  }

  @Post('commands/wait')
  @HttpCode(HttpStatus.OK)
  async submitAndWait(
    @Body(new ZodValidationPipe(waitCommandSchema)) body: WaitCommandDto,
  ): Promise<PendingResult> {
    const reply = await this.brokerService.submitAndWait(
      body.verb,
      body.board,
      body.target,
      body.timeoutMs,
    );
    if (reply.status === 'timeout') {
      throw new CommandTimeoutException(reply.token, reply.waitedMs);
    }
    return reply.result;
  }

  @Get('commands/:token/result')
  async result(
    @Param('token') token: string,
    @Res() response: Response,
  ): Promise<void> {
    const fetched = await this.brokerService.fetchResult(token);
    if (fetched.status === 'ready') {
      response.status(HttpStatus.OK).json(fetched.result);
      return;
    }
    response.status(HttpStatus.ACCEPTED).json({ status: fetched.status });
  }

  @Get('boards')
  async boards(
    @Query(new ZodValidationPipe(scanQuerySchema)) query: ScanQueryDto,
  ): Promise<{ boards: number[] }> {
    return { boards: await this.brokerService.scanBoards(query.timeoutMs) };
  }

  @Get('status')
  status(): Promise<BrokerStatus> {
    return this.brokerService.status();
  }
}
