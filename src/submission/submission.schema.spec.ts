import { model } from 'mongoose';
import { Submission, SubmissionSchema } from './submission.schema';
import { TIER_BANDS } from '../common/config/tiers';

describe('SubmissionSchema', () => {
  const SubmissionModel = model(`${Submission.name}SchemaCheck`, SubmissionSchema);

  it('accepts exactly the tier labels of the band table', () => {
    expect(SubmissionSchema.path('tier').options.enum).toEqual(TIER_BANDS.map((b) => b.label));
  });

  it('rejects a tier outside the band table', () => {
    const doc = new SubmissionModel({ tier: 'Legendary' });

    expect(doc.validateSync()?.errors['tier']?.kind).toBe('enum');
  });
});
