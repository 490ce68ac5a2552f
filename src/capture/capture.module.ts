import { Module } from '@nestjs/common';
import { RegistrationModule } from '../registration/registration.module';
import { CaptureController } from './capture.controller';

@Module({
  imports: [RegistrationModule],
  controllers: [CaptureController],
})
export class CaptureModule {}
