import {
  Controller,
  Get,
  HttpCode,
  HttpException,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { RegistrationService } from './registration.service';
import { toRegistrationResponse } from './registration-response';

export function parseThreshold(raw?: string): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

@Controller()
export class RegistrationController {
  constructor(private registrationService: RegistrationService) {}

  @Get()
  root() {
    return {
      message: 'Face identity resolver is running',
      description:
        'Upload an image to /check_person: a known face is recognized, an unknown one is registered automatically',
    };
  }

  @Post('check_person')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('file'))
  async checkPerson(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Query('threshold') threshold?: string,
  ) {
    if (!file) throw new HttpException('`file` can not be empty', 400);
    if (!file.mimetype.startsWith('image/'))
      throw new HttpException('File must be an image', 400);

    const outcome = await this.registrationService.register({
      image: file.buffer,
      filename: file.originalname,
      threshold: parseThreshold(threshold),
    });
    return toRegistrationResponse(outcome);
  }
}
