import { Module, Global } from '@nestjs/common';
import { EncryptionService } from './encryption/encryption.service';
import { ScoringService } from './scoring/scoring.service';
import { InsightsService } from './insights/insights.service';
import { IdService } from './id/id.service';
import { SanitizeService } from './sanitize/sanitize.service';
import { AdminGuard } from './guards/admin.guard';

@Global()
@Module({
  providers: [EncryptionService, ScoringService, InsightsService, IdService, SanitizeService, AdminGuard],
  exports: [EncryptionService, ScoringService, InsightsService, IdService, SanitizeService, AdminGuard],
})
export class CommonModule {}
