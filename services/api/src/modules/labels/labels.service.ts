import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { EmptyInputError, LabelLimitError, SchemaError } from '@label-sheet/labeler';

import { API_CONFIG, type ApiConfig } from '../../config';
import { createRequestLogger } from '../../utils/logging';
import type { GenerateLabelsQueryDto } from './dto/generate-labels.dto';
import { LABELS_PIPELINE, type LabelsPipeline } from './labels.constants';
import { isAllowedWorkbook, WorkbookError } from './workbook';

export interface UploadedWorkbook {
  originalname: string;
  buffer: Buffer;
}

export interface GeneratedLabels {
  requestId: string;
  filename: string;
  pdf: Buffer;
}

export function translateLabelError(error: unknown): unknown {
  if (error instanceof WorkbookError) {
    return new BadRequestException(`Could not read Excel file: ${error.message}`);
  }
  if (error instanceof EmptyInputError || error instanceof LabelLimitError) {
    return new BadRequestException(error.message);
  }
  if (error instanceof SchemaError) {
    return new BadRequestException({
      statusCode: 400,
      error: 'Bad Request',
      message: `Failed to generate PDF: ${error.message}`,
      missingColumns: error.missing
    });
  }
  return error;
}

@Injectable()
export class LabelsService {
  constructor(
    @Inject(API_CONFIG) private readonly config: ApiConfig,
    @Inject(LABELS_PIPELINE) private readonly pipeline: LabelsPipeline
  ) {}

  async generate(file: UploadedWorkbook | undefined, query: GenerateLabelsQueryDto = {}): Promise<GeneratedLabels> {
    if (!file || !file.originalname) {
      throw new BadRequestException('Please choose an Excel file before uploading.');
    }
    if (!isAllowedWorkbook(file.originalname)) {
      throw new BadRequestException('File type not supported. Upload an .xls or .xlsx file.');
    }

    const { requestId, log } = createRequestLogger('labels');
    const start = Date.now();
    log.info({ file: file.originalname, bytes: file.buffer.length }, 'label upload received');

    try {
      const table = this.pipeline.readWorkbook(file.buffer);
      if (!table.rows.length) {
        throw new EmptyInputError();
      }

      const pdf = await this.pipeline.renderLabels(table.rows, { headers: table.headers });
      log.info({ rows: table.rows.length, bytes: pdf.length, durationMs: Date.now() - start }, 'label sheet generated');

      return { requestId, filename: query.filename ?? this.config.downloadName, pdf };
    } catch (error) {
      log.error({ error }, 'label sheet failed');
      throw translateLabelError(error);
    }
  }
}
