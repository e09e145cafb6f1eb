import { Controller, Post, Query, Res, StreamableFile, UploadedFile, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';

import { GenerateLabelsQueryDto } from './dto/generate-labels.dto';
import { UPLOAD_FIELD } from './labels.constants';
import { LabelsService } from './labels.service';

@Controller('labels')
export class LabelsController {
  constructor(private readonly labelsService: LabelsService) {}

  @Post()
  @UseInterceptors(FileInterceptor(UPLOAD_FIELD))
  async generate(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Query() query: GenerateLabelsQueryDto,
    @Res({ passthrough: true }) res: Response
  ): Promise<StreamableFile> {
    const result = await this.labelsService.generate(file, query);

    res.set({
      'Content-Type': 'application/pdf',
      'Content-Disposition': `attachment; filename="${result.filename}"`,
      'X-Request-Id': result.requestId
    });
    return new StreamableFile(result.pdf);
  }
}
