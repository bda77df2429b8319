import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class HomeService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  appInfo(): { name: string; version: string } {
    return {
      name: this.configService.getOrThrow('app.name', { infer: true }),
      version: this.configService.getOrThrow('app.version', { infer: true }),
    };
  }
}
