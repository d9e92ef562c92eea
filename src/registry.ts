import type { Carrier, CarrierCode } from './types/tracking.js';

export class CarrierRegistry {
  private carriers = new Map<CarrierCode, Carrier>();
  private defaultCode: CarrierCode | null = null;

  register(carrier: Carrier, options: { default?: boolean } = {}): void {
    this.carriers.set(carrier.code, carrier);
    if (options.default || this.defaultCode === null) {
      this.defaultCode = carrier.code;
    }
  }

  get(code: CarrierCode): Carrier | undefined {
    return this.carriers.get(code);
  }

  /** The requested carrier, or the default one when no code is given. */
  resolve(code?: CarrierCode): Carrier | undefined {
    const target = code ?? this.defaultCode;
    return target === null ? undefined : this.carriers.get(target);
  }

  get defaultCarrier(): CarrierCode | null {
    return this.defaultCode;
  }

  list(): CarrierCode[] {
    return [...this.carriers.keys()];
  }
}
