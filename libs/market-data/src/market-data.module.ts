import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CoinglassDerivativesProvider } from './providers/derivatives.provider';
import { PriceIndexProvider } from './providers/price-index.provider';
import { SentimentProvider } from './providers/sentiment.provider';

@Module({
  imports: [ConfigModule],
  providers: [PriceIndexProvider, SentimentProvider, CoinglassDerivativesProvider],
  exports: [PriceIndexProvider, SentimentProvider, CoinglassDerivativesProvider],
})
export class MarketDataModule {}
