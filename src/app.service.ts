import { Injectable, OnModuleInit } from '@nestjs/common';
import { SettingsService } from './settings/settings.service';

@Injectable()
export class AppService implements OnModuleInit {
  constructor(private settingsService: SettingsService) {}

  async onModuleInit() {
    await this.settingsService.initializeDefaults();
  }

  getHello(): string {
    return 'Signal Synthesis API';
  }
}
