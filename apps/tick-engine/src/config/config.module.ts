import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  validatedEnvProvider,
  engineConfigProvider,
  VALIDATED_ENV,
  ENGINE_CONFIG,
} from './env-config.provider';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [validatedEnvProvider, engineConfigProvider],
  exports: [VALIDATED_ENV, ENGINE_CONFIG],
})
export class EngineConfigModule {}
