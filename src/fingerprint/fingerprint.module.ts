import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SharedModule } from '../shared/shared.module';
import { Fingerprint } from './fingerprint.entity';
import { FingerprintService } from './fingerprint.service';

@Module({
  imports: [SharedModule, TypeOrmModule.forFeature([Fingerprint])],
  providers: [FingerprintService],
  exports: [FingerprintService],
})
export class FingerprintModule {}
