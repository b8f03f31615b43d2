import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export interface AppInfo {
  name: string;
  version: string;
  description: string;
}

@Injectable()
export class HomeService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  appInfo(): AppInfo {
    return {
      name: this.configService.get('app.name', { infer: true }) ?? '',
      version: '1.0.0',
      description:
        'Structured Markdown summaries and vector chunks for extracted clinical documents',
    };
  }
}
