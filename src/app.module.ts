import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { InboxModule, inboxConfigFromEnv } from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    InboxModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => inboxConfigFromEnv(config),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
