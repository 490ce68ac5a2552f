import { Controller, Logger } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { RegistrationService } from '../registration/registration.service';
import { toRegistrationResponse } from '../registration/registration-response';
import { FaceCapturedMessage } from './requests/face-captured.message';

@Controller()
export class CaptureController {
  constructor(private registrationService: RegistrationService) {}

  @MessagePattern('face-captured')
  async onFaceCaptured(@Payload() message: FaceCapturedMessage) {
    const image = Buffer.from(message?.image ?? '', 'base64');
    new Logger('Capture').log(
      `Captured ${image.length} bytes from ${message?.source ?? 'unknown source'}`,
    );

    if (image.length === 0) {
      return toRegistrationResponse({
        status: 'analysis_failed',
        error: 'Message carries no image',
      });
    }

    const outcome = await this.registrationService.register({
      image,
      filename: message.filename,
      threshold: message.threshold,
    });
    return toRegistrationResponse(outcome);
  }
}
