import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validationSchema } from './config/validation.schema';
import { CaptchaClientModule } from './modules/captcha-client/captcha-client.module';
import { WinstonLoggerService } from './common/services/winston-logger.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      envFilePath: ['.env.local', '.env'],
    }),
    CaptchaClientModule,
  ],
  providers: [WinstonLoggerService],
})
export class AppModule {}
