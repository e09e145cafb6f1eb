import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';

import { API_CONFIG, type ApiConfig } from '../../config';
import { LabelsController } from './labels.controller';
import { defaultLabelsPipeline, LABELS_PIPELINE } from './labels.constants';
import { LabelsService } from './labels.service';

@Module({
  imports: [
    MulterModule.registerAsync({
      useFactory: (config: ApiConfig) => ({ limits: { fileSize: config.maxUploadBytes } }),
      inject: [API_CONFIG]
    })
  ],
  controllers: [LabelsController],
  providers: [
    LabelsService,
    {
      provide: LABELS_PIPELINE,
      useValue: defaultLabelsPipeline
    }
  ]
})
export class LabelsModule {}
