import { Injectable, BadRequestException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ConfigService } from '@nestjs/config';
import { Setting } from '../entities/setting.entity';
import { LoggerService } from '../logger/logger.service';

export interface SignalSettings {
  universe: string;
  stochWindow: number;
  stochKSmooth: number;
  stochDSmooth: number;
  cciPeriod: number;
  dmiPeriod: number;
  slopePeriod: number;
  adxThreshold: number;
  slopeThreshold: number;
  signedAdx: boolean;
  synthesisCadenceHours: number;
}

const SETTING_KEYS: Record<keyof SignalSettings, string> = {
  universe: 'UNIVERSE',
  stochWindow: 'STOCH_WINDOW',
  stochKSmooth: 'STOCH_K_SMOOTH',
  stochDSmooth: 'STOCH_D_SMOOTH',
  cciPeriod: 'CCI_PERIOD',
  dmiPeriod: 'DMI_PERIOD',
  slopePeriod: 'SLOPE_PERIOD',
  adxThreshold: 'ADX_THRESHOLD',
  slopeThreshold: 'SLOPE_THRESHOLD',
  signedAdx: 'SIGNED_ADX',
  synthesisCadenceHours: 'SYNTHESIS_CADENCE_HOURS',
};

@Injectable()
export class SettingsService {
  private readonly defaultSettings: Record<string, { value: string; description: string }> = {
    UNIVERSE: { value: 'AAPL,MSFT', description: 'Comma-separated symbols used when no assets are configured' },
    STOCH_WINDOW: { value: '55', description: 'Raw %K high/low look-back (bars)' },
    STOCH_K_SMOOTH: { value: '55', description: 'Moving average length smoothing raw %K' },
    STOCH_D_SMOOTH: { value: '36', description: 'Moving average length smoothing %K into %D' },
    CCI_PERIOD: { value: '20', description: 'Commodity channel index period' },
    DMI_PERIOD: { value: '14', description: 'Directional movement / ADX period' },
    SLOPE_PERIOD: { value: '10', description: 'Bars in the %K/%D regression slope' },
    ADX_THRESHOLD: { value: '20', description: 'ADX level above which DMI direction counts' },
    SLOPE_THRESHOLD: { value: '0.5', description: 'Absolute %K and %D slope required for Buy+/Sell+' },
    SIGNED_ADX: { value: 'false', description: 'Store ADX negative when -DI dominates' },
    SYNTHESIS_CADENCE_HOURS: { value: '4', description: 'How often the scheduler enqueues a synthesis run (hours)' },
  };

  constructor(
    @InjectRepository(Setting)
    private settingRepository: Repository<Setting>,
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('SettingsService');
  }

  /**
   * Get a setting value from database, falling back to env var, then default
   */
  async getSetting(key: string): Promise<string> {
    const dbSetting = await this.settingRepository.findOne({ where: { key } });
    if (dbSetting) {
      return dbSetting.value;
    }

    // Environment values never pass through updateSetting, so check them here
    const envValue = this.configService.get<string>(key);
    if (envValue) {
      this.validateSetting(key, envValue);
      return envValue;
    }

    const defaultValue = this.defaultSettings[key];
    if (defaultValue) {
      return defaultValue.value;
    }

    throw new BadRequestException(`Unknown setting key: ${key}`);
  }

  async getSettingNumber(key: string): Promise<number> {
    const value = await this.getSetting(key);
    const num = parseFloat(value);
    if (isNaN(num)) {
      throw new BadRequestException(`Setting ${key} is not a valid number: ${value}`);
    }
    return num;
  }

  async getSettingInt(key: string): Promise<number> {
    const value = await this.getSetting(key);
    const num = parseInt(value, 10);
    if (isNaN(num)) {
      throw new BadRequestException(`Setting ${key} is not a valid integer: ${value}`);
    }
    return num;
  }

  async getSettingBoolean(key: string): Promise<boolean> {
    const value = (await this.getSetting(key)).trim().toLowerCase();
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    throw new BadRequestException(`Setting ${key} is not a valid boolean: ${value}`);
  }

  async getSignalSettings(): Promise<SignalSettings> {
    return {
      universe: await this.getSetting('UNIVERSE'),
      stochWindow: await this.getSettingInt('STOCH_WINDOW'),
      stochKSmooth: await this.getSettingInt('STOCH_K_SMOOTH'),
      stochDSmooth: await this.getSettingInt('STOCH_D_SMOOTH'),
      cciPeriod: await this.getSettingInt('CCI_PERIOD'),
      dmiPeriod: await this.getSettingInt('DMI_PERIOD'),
      slopePeriod: await this.getSettingInt('SLOPE_PERIOD'),
      adxThreshold: await this.getSettingNumber('ADX_THRESHOLD'),
      slopeThreshold: await this.getSettingNumber('SLOPE_THRESHOLD'),
      signedAdx: await this.getSettingBoolean('SIGNED_ADX'),
      synthesisCadenceHours: await this.getSettingInt('SYNTHESIS_CADENCE_HOURS'),
    };
  }

  async updateSetting(key: string, value: string, description?: string): Promise<Setting> {
    if (!this.defaultSettings[key]) {
      throw new BadRequestException(`Unknown setting key: ${key}`);
    }

    this.validateSetting(key, value);

    let setting = await this.settingRepository.findOne({ where: { key } });
    const oldValue = setting?.value;

    if (setting) {
      setting.value = value;
      if (description) {
        setting.description = description;
      }
    } else {
      setting = this.settingRepository.create({
        key,
        value,
        description: description || this.defaultSettings[key].description,
      });
    }

    const saved = await this.settingRepository.save(setting);

    this.logger.log(`Setting updated: ${key}`, {
      key,
      oldValue,
      newValue: value,
      changed: oldValue !== value,
    });

    return saved;
  }

  /**
   * Validate every update first so a bad value leaves all settings unchanged
   */
  async updateSettings(updates: Partial<SignalSettings>): Promise<Setting[]> {
    const updatesMap = new Map<string, string>();

    for (const [field, value] of Object.entries(updates)) {
      if (value === undefined) continue;

      const dbKey = this.mapFieldToDbKey(field);
      if (!dbKey) {
        this.logger.warn(`Unknown setting field: ${field}`);
        continue;
      }

      this.validateSetting(dbKey, String(value));
      updatesMap.set(dbKey, String(value));
    }

    const results: Setting[] = [];
    for (const [dbKey, value] of updatesMap.entries()) {
      results.push(await this.updateSetting(dbKey, value));
    }
    return results;
  }

  private validateSetting(key: string, value: string): void {
    switch (key) {
      case 'UNIVERSE': {
        const symbols = value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
        if (symbols.length === 0) {
          throw new BadRequestException('UNIVERSE must contain at least one symbol');
        }
        break;
      }

      case 'STOCH_WINDOW':
      case 'STOCH_K_SMOOTH':
      case 'STOCH_D_SMOOTH':
      case 'CCI_PERIOD':
      case 'DMI_PERIOD':
      case 'SLOPE_PERIOD':
      case 'SYNTHESIS_CADENCE_HOURS': {
        const intValue = Number(value);
        if (!Number.isInteger(intValue) || intValue < 1) {
          throw new BadRequestException(`${key} must be a positive integer`);
        }
        if (key === 'SLOPE_PERIOD' && intValue < 2) {
          throw new BadRequestException('SLOPE_PERIOD must be at least 2');
        }
        if (key === 'SYNTHESIS_CADENCE_HOURS' && intValue > 24) {
          throw new BadRequestException('SYNTHESIS_CADENCE_HOURS must be between 1 and 24');
        }
        break;
      }

      case 'ADX_THRESHOLD': {
        const adx = parseFloat(value);
        if (isNaN(adx) || adx < 0 || adx > 100) {
          throw new BadRequestException('ADX_THRESHOLD must be between 0 and 100');
        }
        break;
      }

      case 'SLOPE_THRESHOLD': {
        const slope = parseFloat(value);
        if (isNaN(slope) || slope < 0) {
          throw new BadRequestException('SLOPE_THRESHOLD must be a non-negative number');
        }
        break;
      }

      case 'SIGNED_ADX':
        if (!['true', 'false', '1', '0'].includes(value.trim().toLowerCase())) {
          throw new BadRequestException('SIGNED_ADX must be true or false');
        }
        break;
    }
  }

  private mapFieldToDbKey(field: string): string | null {
    const entry = Object.entries(SETTING_KEYS).find(([name]) => name === field);
    return entry ? entry[1] : null;
  }

  /**
   * Initialize default settings in database if they don't exist
   */
  async initializeDefaults(): Promise<void> {
    for (const [key, { value, description }] of Object.entries(this.defaultSettings)) {
      const existing = await this.settingRepository.findOne({ where: { key } });
      if (!existing) {
        await this.settingRepository.save({
          key,
          value,
          description,
        });
        this.logger.debug(`Initialized default setting: ${key} = ${value}`);
      }
    }
  }
}
