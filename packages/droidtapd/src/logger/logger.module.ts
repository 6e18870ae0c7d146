import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WinstonModule } from 'nest-winston';
import { createWinstonLogger } from './winston-logger.service';

@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        instance: createWinstonLogger(
          configService.get<string>('DROIDTAP_LOG_DIR'),
        ),
      }),
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}
