import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { FaceAnalyzerService } from './face-analyzer.service';
import { FACE_ANALYZER } from './face-analysis';

@Module({
  imports: [HttpModule, ConfigModule],
  providers: [
    FaceAnalyzerService,
    {
      provide: FACE_ANALYZER,
      useExisting: FaceAnalyzerService,
    },
  ],
  exports: [FACE_ANALYZER],
})
export class AnalyzerModule {}
