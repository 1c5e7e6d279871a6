import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { MarketController } from './market.controller';
import { MarketService } from './market.service';
import { IssClient } from './iss.client';

@Module({
  imports: [
    // One pooled transport for the life of the process
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const maxSockets = config.get<number>('iss.maxSockets') ?? 8;
        return {
          baseURL: config.get<string>('iss.baseUrl') ?? 'https://iss.moex.com/iss',
          timeout: config.get<number>('iss.timeoutMs') ?? 10_000,
          headers: { Accept: 'application/json' },
          httpAgent: new HttpAgent({ keepAlive: true, maxSockets }),
          httpsAgent: new HttpsAgent({ keepAlive: true, maxSockets }),
        };
      },
    }),
  ],
  controllers: [MarketController],
  providers: [MarketService, IssClient],
  exports: [MarketService],
})
export class MarketModule {}
