import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SharedModule } from '../shared/shared.module';
import { Identity } from './identity.entity';
import { GalleryService } from './gallery.service';
import { GalleryController } from './gallery.controller';
import {
  DISPLAY_CODE_GENERATOR,
  RandomDisplayCodeGenerator,
} from './display-code.generator';
import { IDENTITY_MATCHER, LinearScanMatcher } from './identity-matcher';

@Module({
  imports: [SharedModule, TypeOrmModule.forFeature([Identity])],
  controllers: [GalleryController],
  providers: [
    GalleryService,
    {
      provide: DISPLAY_CODE_GENERATOR,
      useClass: RandomDisplayCodeGenerator,
    },
    {
      provide: IDENTITY_MATCHER,
      useClass: LinearScanMatcher,
    },
  ],
  exports: [GalleryService],
})
export class GalleryModule {}
