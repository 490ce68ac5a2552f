import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SharedModule } from '../shared/shared.module';
import { GalleryModule } from '../gallery/gallery.module';
import { FingerprintModule } from '../fingerprint/fingerprint.module';
import { DetectionEvent } from './detection-event.entity';
import { ActivityLogService } from './activity-log.service';
import { ActivityController } from './activity.controller';

@Module({
  imports: [
    SharedModule,
    GalleryModule,
    FingerprintModule,
    TypeOrmModule.forFeature([DetectionEvent]),
  ],
  controllers: [ActivityController],
  providers: [ActivityLogService],
  exports: [ActivityLogService],
})
export class ActivityModule {}
