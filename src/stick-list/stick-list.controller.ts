import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Post,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { APP_CONFIG } from '../config/stick-list.config';
import { StickListOptionsDto } from './dto/stick-list-options.dto';
import { StickListService } from './stick-list.service';
import { StickListResponse } from './stick-list.types';
import { UPLOAD_UI_CLIENT_JS } from './upload-ui.client';
import { UPLOAD_UI_HTML } from './upload-ui.page';

export interface StickListUploads {
  source?: Express.Multer.File[];
  template?: Express.Multer.File[];
}

@Controller('stick-list')
export class StickListController {
  constructor(private readonly stickListService: StickListService) {}

  @Get('upload-ui')
  @Header('Content-Type', 'text/html; charset=utf-8')
  getUploadUi(): string {
    return UPLOAD_UI_HTML;
  }

  @Get('upload-ui.js')
  @Header('Content-Type', 'application/javascript; charset=utf-8')
  getUploadUiScript(): string {
    return UPLOAD_UI_CLIENT_JS;
  }

  @Post('transform')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(
    FileFieldsInterceptor(
      [
        { name: 'source', maxCount: 1 },
        { name: 'template', maxCount: 1 },
      ],
      {
        storage: memoryStorage(),
        limits: {
          fileSize: APP_CONFIG.uploadLimitBytes,
        },
        fileFilter: (_req, file, callback) => {
          const allowed = file.originalname.toLowerCase().endsWith('.xlsx');

          callback(
            allowed ? null : new BadRequestException('Only .xlsx files are supported'),
            allowed,
          );
        },
      },
    ),
  )
  async transform(
    @UploadedFiles() files: StickListUploads = {},
    @Body() options: StickListOptionsDto,
  ): Promise<StickListResponse> {
    const source = files.source?.[0];
    if (!source?.buffer) {
      throw new BadRequestException('No source spreadsheet uploaded');
    }

    const run = await this.stickListService.transform(
      source.buffer,
      files.template?.[0]?.buffer,
      this.stickListService.resolveOptions(options),
    );

    return this.stickListService.toResponse(run);
  }
}
