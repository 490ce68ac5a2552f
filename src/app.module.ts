import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SharedModule } from './shared/shared.module';
import { GalleryModule } from './gallery/gallery.module';
import { FingerprintModule } from './fingerprint/fingerprint.module';
import { ActivityModule } from './activity/activity.module';
import { AnalyzerModule } from './analyzer/analyzer.module';
import { RegistrationModule } from './registration/registration.module';
import { CaptureModule } from './capture/capture.module';
import { RecognitionExceptionFilter } from './registration/recognition-exception.filter';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        host: config.get<string>('DB_HOST'),
        port: Number(config.get<string>('DB_PORT', '5432')),
        username: config.get<string>('DB_USERNAME'),
        password: config.get<string>('DB_PASSWORD'),
        database: config.get<string>('DB_NAME'),
        autoLoadEntities: true,
        synchronize: config.get<string>('DB_SYNC') === 'true',
      }),
      inject: [ConfigService],
    }),
    SharedModule,
    GalleryModule,
    FingerprintModule,
    ActivityModule,
    AnalyzerModule,
    RegistrationModule,
    CaptureModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: RecognitionExceptionFilter,
    },
  ],
})
export class AppModule {}
