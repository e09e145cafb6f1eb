import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import { API_CONFIG, loadApiConfig } from '../config';

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: API_CONFIG,
      useFactory: (config: ConfigService) => loadApiConfig((name) => config.get<string>(name)),
      inject: [ConfigService]
    }
  ],
  exports: [API_CONFIG]
})
export class ApiConfigModule {}
