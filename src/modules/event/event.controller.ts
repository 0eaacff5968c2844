import {
  Body,
  Controller,
  ForbiddenException,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  CurrentUser,
  CurrentUserData,
} from '../../common/decorators/current-user.decorator';
import { AuthGuard } from '../../common/guards/auth.guard';
import { ScheduleEventDto } from './dto/schedule-event.dto';
import { EventRecord } from './event-catalog';
import { EventService } from './event.service';
import { EventSeatMapResponse } from './interfaces/seat-map-response.interface';

/**
 * EventController
 *
 * Endpoints:
 * - POST /api/events - Schedule an event (admin)
 * - GET /api/events/:id/seats - Seat map with live availability (public)
 */
@Controller('events')
export class EventController {
  constructor(private readonly eventService: EventService) {}

  @Post()
  @UseGuards(AuthGuard)
  @HttpCode(HttpStatus.CREATED)
  async scheduleEvent(
    @Body() dto: ScheduleEventDto,
    @CurrentUser() user: CurrentUserData,
  ): Promise<EventRecord> {
    if (user.role !== 'admin') {
      throw new ForbiddenException({
        statusCode: 403,
        errorCode: 'ADMIN_ONLY',
        message: 'Only administrators can schedule events',
        timestamp: new Date().toISOString(),
      });
    }

    return this.eventService.scheduleEvent({
      stadiumId: dto.stadium_id,
      name: dto.name,
      startsAt: dto.starts_at,
    });
  }

  @Get(':id/seats')
  async getSeatMap(@Param('id') eventId: string): Promise<EventSeatMapResponse> {
    return this.eventService.getSeatMap(eventId);
  }
}
