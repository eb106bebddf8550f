import { Controller, Put, Body, Get } from '@nestjs/common';
import { SettingsService } from './settings.service';
import { UpdateSettingsDto } from './dto/update-settings.dto';

@Controller('api/settings')
export class SettingsController {
  constructor(private settingsService: SettingsService) {}

  @Get()
  async getSettings() {
    return await this.settingsService.getSignalSettings();
  }

  @Put()
  async updateSettings(@Body() settings: UpdateSettingsDto) {
    const updated = await this.settingsService.updateSettings(settings);
    const newSettings = await this.settingsService.getSignalSettings();

    return {
      message: 'Settings updated successfully',
      updated: updated.length,
      settings: newSettings,
    };
  }
}
