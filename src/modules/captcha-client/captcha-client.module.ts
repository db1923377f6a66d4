import { Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HttpModule, HttpService } from '@nestjs/axios';
import { CAPTCHA_CLIENT } from './config/constants';
import { CaptchaClientConfigService } from './config/captcha-client-config.service';
import { createCaptchaClient } from './clients/captcha-client.factory';
import { ICaptchaClient } from './interfaces/captcha-client.interface';
import { CaptchaSolverService } from './services/captcha-solver.service';

@Module({
  imports: [ConfigModule, HttpModule],
  providers: [
    CaptchaClientConfigService,
    {
      provide: CAPTCHA_CLIENT,
      inject: [CaptchaClientConfigService, HttpService],
      useFactory: (
        configService: CaptchaClientConfigService,
        httpService: HttpService,
      ): ICaptchaClient =>
        createCaptchaClient(
          configService.getCredentials(),
          configService.getConfig(),
          { httpService },
        ),
    },
    CaptchaSolverService,
  ],
  exports: [CAPTCHA_CLIENT, CaptchaClientConfigService, CaptchaSolverService],
})
export class CaptchaClientModule implements OnApplicationShutdown {
  constructor(@Inject(CAPTCHA_CLIENT) private readonly client: ICaptchaClient) {}

  async onApplicationShutdown(): Promise<void> {
    await this.client.close();
  }
}
