import { Module } from '@nestjs/common';

import { ApiConfigModule } from './config.module';
import { LabelsModule } from './labels/labels.module';

@Module({
  imports: [ApiConfigModule, LabelsModule]
})
export class AppModule {}
