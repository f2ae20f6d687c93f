import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TssConverterModule } from './contexts/tss-converter';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    TssConverterModule,
  ],
})
export class AppModule {}
