import {
  Body,
  Controller,
  ForbiddenException,
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
import { TransferTicketDto } from './dto/transfer-ticket.dto';
import { TicketService } from './ticket.service';
import { TicketRecord } from './ticket.types';

const GATE_ROLES = new Set(['staff', 'admin']);

/**
 * TicketController
 *
 * Endpoints:
 * - POST /api/tickets/:id/scan - Mark a ticket used at the gate
 * - POST /api/tickets/:id/transfer - Transfer a ticket to another customer
 *
 * Ticket errors reach the global HttpExceptionFilter unmapped.
 */
@Controller('tickets')
@UseGuards(AuthGuard)
export class TicketController {
  constructor(private readonly ticketService: TicketService) {}

  @Post(':id/scan')
  @HttpCode(HttpStatus.OK)
  async scan(
    @Param('id') ticketId: string,
    @CurrentUser() user: CurrentUserData,
  ): Promise<TicketRecord> {
    if (!GATE_ROLES.has(user.role)) {
      throw new ForbiddenException({
        statusCode: 403,
        errorCode: 'GATE_STAFF_ONLY',
        message: 'Only gate staff can scan tickets',
        timestamp: new Date().toISOString(),
      });
    }
    return this.ticketService.markUsed(ticketId);
  }

  @Post(':id/transfer')
  @HttpCode(HttpStatus.OK)
  async transfer(
    @Param('id') ticketId: string,
    @Body() dto: TransferTicketDto,
    @CurrentUser('id') customerId: string,
  ): Promise<TicketRecord> {
    return this.ticketService.transfer(ticketId, customerId, dto.recipient_id);
  }
}
