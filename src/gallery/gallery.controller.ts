import { Controller, Get, HttpException, Param } from '@nestjs/common';
import { GalleryService } from './gallery.service';

@Controller()
export class GalleryController {
  constructor(private galleryService: GalleryService) {}

  @Get('all_persons')
  async allPersons() {
    const persons = await this.galleryService.list();
    return {
      total_persons: persons.length,
      persons: persons.map((person) => person.toPersonInfo()),
    };
  }

  @Get('persons/:displayCode')
  async person(@Param('displayCode') displayCode: string) {
    const person = await this.galleryService.findByDisplayCode(displayCode);
    if (!person) throw new HttpException(`${displayCode} not found`, 404);
    return person.toPersonInfo();
  }
}
