import { Body, Controller, Post, UseGuards } from '@nestjs/common';
import { AdminGuard } from '../common/guards/admin.guard';
import { AssessmentService } from './assessment.service';
import { ScoreAssessmentDto } from './dto/score-assessment.dto';

@Controller('assessment')
@UseGuards(AdminGuard)
export class AssessmentController {
  constructor(private assessmentService: AssessmentService) {}

  @Post('score')
  score(@Body() dto: ScoreAssessmentDto) {
    return this.assessmentService.preview(dto.answers);
  }
}
