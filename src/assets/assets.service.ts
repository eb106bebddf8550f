import { ConflictException, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Asset } from '../entities/asset.entity';
import { SettingsService } from '../settings/settings.service';
import { LoggerService } from '../logger/logger.service';
import { CreateAssetDto } from './dto/create-asset.dto';

export const parseUniverse = (value: string): string[] => [
  ...new Set(
    value
      .split(',')
      .map((symbol) => symbol.trim().toUpperCase())
      .filter((symbol) => symbol.length > 0),
  ),
];

@Injectable()
export class AssetsService {
  constructor(
    @InjectRepository(Asset)
    private assetRepository: Repository<Asset>,
    private settingsService: SettingsService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('AssetsService');
  }

  async findAll(): Promise<Asset[]> {
    return this.assetRepository.find({ order: { symbol: 'ASC' } });
  }

  async findEnabled(): Promise<Asset[]> {
    return this.assetRepository.find({ where: { enabled: true }, order: { symbol: 'ASC' } });
  }

  async findBySymbol(symbol: string): Promise<Asset | null> {
    return this.assetRepository.findOne({ where: { symbol } });
  }

  async create(dto: CreateAssetDto): Promise<Asset> {
    const symbol = dto.symbol.trim().toUpperCase();
    if (await this.findBySymbol(symbol)) {
      throw new ConflictException(`Asset ${symbol} already exists`);
    }

    const asset = await this.assetRepository.save(
      this.assetRepository.create({
        symbol,
        displayName: dto.displayName ?? '',
        enabled: dto.enabled ?? true,
      }),
    );
    this.logger.log(`Asset added: ${symbol}`, { enabled: asset.enabled });
    return asset;
  }

  /**
   * Symbols to synthesize: enabled assets, or the UNIVERSE setting when none are configured.
   */
  async getUniverse(): Promise<string[]> {
    const enabled = await this.findEnabled();
    if (enabled.length > 0) {
      return parseUniverse(enabled.map((asset) => asset.symbol).join(','));
    }

    const universe = parseUniverse(await this.settingsService.getSetting('UNIVERSE'));
    this.logger.debug('No enabled assets, using UNIVERSE setting', { universe });
    return universe;
  }
}
