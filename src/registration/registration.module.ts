import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { GalleryModule } from '../gallery/gallery.module';
import { FingerprintModule } from '../fingerprint/fingerprint.module';
import { ActivityModule } from '../activity/activity.module';
import { AnalyzerModule } from '../analyzer/analyzer.module';
import { RegistrationService } from './registration.service';
import { RegistrationController } from './registration.controller';
import { OutcomeNotifierService } from './outcome-notifier.service';

@Module({
  imports: [
    HttpModule,
    ConfigModule,
    GalleryModule,
    FingerprintModule,
    ActivityModule,
    AnalyzerModule,
  ],
  controllers: [RegistrationController],
  providers: [RegistrationService, OutcomeNotifierService],
  exports: [RegistrationService],
})
export class RegistrationModule {}
