import { Body, Controller, Get, Headers, Param, Patch, Post, UseGuards } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { AdminGuard, ADMIN_KEY_HEADER } from '../common/guards/admin.guard';
import { SubmissionService } from './submission.service';
import { CreateSubmissionDto } from './dto/create-submission.dto';

@Controller('submission')
export class SubmissionController {
  constructor(
    private submissionService: SubmissionService,
    private adminGuard: AdminGuard,
  ) {}

  @Post()
  @Throttle({ default: { ttl: 60_000, limit: 1 } })
  async submit(@Body() dto: CreateSubmissionDto, @Headers(ADMIN_KEY_HEADER) adminKey?: string) {
    return this.submissionService.submit(dto, this.adminGuard.isAdmin(adminKey));
  }

  @Get(':submissionId')
  @UseGuards(AdminGuard)
  async findOne(@Param('submissionId') submissionId: string) {
    return this.submissionService.findOne(submissionId);
  }

  @Patch(':submissionId/approve')
  @UseGuards(AdminGuard)
  async approve(@Param('submissionId') submissionId: string) {
    return this.submissionService.approve(submissionId);
  }
}
