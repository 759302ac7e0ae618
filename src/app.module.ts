import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CliModule } from './cli/cli.module';
import { etlConfig } from './config/etl.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [etlConfig],
    }),
    CliModule,
  ],
})
export class AppModule {}
