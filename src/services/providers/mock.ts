import type {
  ProviderAvailability,
  TranslatedUnit,
  TranslationProvider,
  TranslationRequest
} from '@/services/providers/types';

export class MockProvider implements TranslationProvider {
  readonly id: string;

  constructor(model = 'echo') {
    this.id = `mock:${model}`;
  }

  async checkAvailability(): Promise<ProviderAvailability> {
    return { available: true };
  }

  async translate(request: TranslationRequest): Promise<TranslatedUnit[]> {
    return request.units.map((unit) => ({
      unitId: unit.unitId,
      text: `[${request.targetLanguage}] ${unit.text}`
    }));
  }
}
