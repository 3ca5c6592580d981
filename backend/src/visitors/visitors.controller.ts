import { Body, Controller, Delete, Get, HttpCode, Param, Post, Put } from '@nestjs/common';

import { OccupancyStats } from './visitor.types';
import { RegisterVisitorDto } from './dto/register-visitor.dto';
import { UpdateStatusDto } from './dto/update-status.dto';
import { toVisitorResponse, VisitorResponseDto } from './dto/visitor-response.dto';
import { VisitorsService } from './visitors.service';

@Controller('visitors')
export class VisitorsController {
  constructor(private readonly visitorsService: VisitorsService) {}

  @Post()
  async register(
    @Body() dto: RegisterVisitorDto,
  ): Promise<{ detail: string; visitor_id: string }> {
    const record = await this.visitorsService.register({
      name: dto.name,
      identityNumber: dto.ic_number,
      licensePlate: dto.license_plate,
      unitNumber: dto.unit_number,
    });
    return { detail: 'Visitor created successfully', visitor_id: record.id };
  }

  @Get()
  async list(): Promise<VisitorResponseDto[]> {
    const visitors = await this.visitorsService.listAll();
    return visitors.map(toVisitorResponse);
  }

  @Get('stats')
  stats(): Promise<OccupancyStats> {
    return this.visitorsService.getOccupancy();
  }

  @Put(':id/status')
  async updateStatus(
    @Param('id') id: string,
    @Body() dto: UpdateStatusDto,
  ): Promise<{ message: string; changed: boolean }> {
    const { changed } = await this.visitorsService.updateStatus(id, dto.status);
    return {
      message: changed
        ? 'Visitor status updated successfully'
        : 'Visitor status already set; no changes made',
      changed,
    };
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(@Param('id') id: string): Promise<void> {
    await this.visitorsService.delete(id);
  }
}
