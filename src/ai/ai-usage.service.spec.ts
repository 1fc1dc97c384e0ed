import { AiUsageService } from './ai-usage.service';
import { AiUsageRepository } from '../pg/ai-usage.repository';

describe('AiUsageService', () => {
  let repo: jest.Mocked<Pick<AiUsageRepository, 'create'>>;
  let service: AiUsageService;

  beforeEach(() => {
    repo = { create: jest.fn() };
    service = new AiUsageService(repo as unknown as AiUsageRepository);
  });

  it('should price tokens per million for a known model', () => {
    // 1M input @ 0.4 + 0.5M output @ 1.6 = 0.4 + 0.8
    expect(service.computeCostUsd('gpt-4.1-mini', 1_000_000, 500_000)).toBe(1.2);
  });

  it('should fall back to default pricing for unknown models', () => {
    expect(service.computeCostUsd('some-new-model', 10_000, 0)).toBe(0.004);
  });

  it('should return null when there is nothing to bill', () => {
    expect(service.computeCostUsd('gpt-4.1-mini', 0, 0)).toBeNull();
  });

  it('should swallow repository failures so metering never fails a request', async () => {
    repo.create.mockRejectedValueOnce(new Error('connection refused'));

    await expect(
      service.record({
        kind: 'synthesizeLegalAnalysis',
        model: 'gpt-4.1-mini',
        inputTokens: 1,
        outputTokens: 1,
        totalTokens: 2,
      }),
    ).resolves.toBeUndefined();
  });
});
