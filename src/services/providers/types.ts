export interface ProviderUnit {
  unitId: number;
  text: string;
  context: {
    before: string[];
    after: string[];
  };
}

// An already translated unit sent along as reference only.
export interface PrecedingUnit {
  unitId: number;
  text: string;
  translatedText: string;
}

export interface TranslationRequest {
  sourceLanguage: string;
  targetLanguage: string;
  units: ProviderUnit[];
  preceding: PrecedingUnit[];
  signal?: AbortSignal;
}

export interface TranslatedUnit {
  unitId: number;
  text: string;
}

export interface ProviderAvailability {
  available: boolean;
  // Why the provider cannot be used; absent when it can.
  reason?: string;
}

export interface TranslationProvider {
  // Used in log lines only.
  readonly id: string;
  translate(request: TranslationRequest): Promise<TranslatedUnit[]>;
  /** Confirms the backend answers and serves the configured model. Never rejects. */
  checkAvailability(signal?: AbortSignal): Promise<ProviderAvailability>;
}
