import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Controller()
export class AppController {
  constructor(private readonly config: ConfigService) {}

  @Get('health')
  health() {
    return {
      ok: true,
      env: this.config.get<string>('nodeEnv'),
      exchange: this.config.get<string>('iss.exchange'),
      board: this.config.get<string>('iss.primaryBoard'),
      uptimeSec: Math.round(process.uptime()),
      version: 'v1',
    };
  }
}
