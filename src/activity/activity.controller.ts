import { Controller, Get, Query } from '@nestjs/common';
import { ActivityLogService } from './activity-log.service';

@Controller()
export class ActivityController {
  constructor(private activityLogService: ActivityLogService) {}

  @Get('stats')
  async stats() {
    const stats = await this.activityLogService.stats();
    return {
      total_registered_persons: stats.totalIdentities,
      total_detections: stats.totalDetections,
      total_exact_duplicates: stats.totalExactDuplicates,
      detections_last_24h: stats.detectionsLast24h,
      most_seen_person: {
        person_code: stats.mostSeen?.displayCode ?? null,
        detection_count: stats.mostSeen?.totalDetections ?? 0,
      },
    };
  }

  @Get('events/recent')
  async recent(@Query('limit') limit?: string) {
    const events = await this.activityLogService.recent(
      limit === undefined ? undefined : Number(limit),
    );
    return events.map((event) => event.toEventInfo());
  }
}
