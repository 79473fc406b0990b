import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  type RawBodyRequest,
} from '@nestjs/common';
import type { Request } from 'express';
import { driveNotificationSchema } from './dto/drive-notification.dto.js';
import { SyncService } from './sync.service.js';
import { SIGNATURE_HEADER } from './webhook-signature.js';

@Controller('api/v1/sync')
export class SyncController {
  constructor(private readonly syncService: SyncService) {}

  @Post('drive')
  @HttpCode(HttpStatus.OK)
  async drive(
    @Req() request: RawBodyRequest<Request>,
    @Headers(SIGNATURE_HEADER) signature: string | undefined,
    @Body() body: unknown,
  ) {
    this.syncService.verify(request.rawBody, signature);
    const notification = driveNotificationSchema.parse(body);
    const outcome = await this.syncService.handle(notification);
    return { data: outcome };
  }
}
