import type { MeasurementValues } from '@grid-stream/domain';
import { SeededRng } from '@grid-stream/adapters';

const BASE_VOLTAGE_V = 13_800; // 13.8 kV bus
const BASE_FREQUENCY_HZ = 50;
const BASE_POWER_W = 10_000;

export interface GridSignalOptions {
  seed: number;
  faultProbability: number;
}

/**
 * Synthetic bus measurements: slow sinusoidal drift plus gaussian noise,
 * with an occasional fault that sags the voltage.
 */
export class GridSignal {
  private readonly rng: SeededRng;

  constructor(private readonly options: GridSignalOptions) {
    this.rng = new SeededRng(options.seed);
  }

  /** Sample at `t` seconds since the stream started. */
  sample(t: number): MeasurementValues {
    const rng = this.rng;
    const fault = rng.chance(this.options.faultProbability) ? 1 : 0;

    let voltageVar = 0.05 * Math.sin(2 * Math.PI * 0.1 * t) + 0.02 * rng.nextGaussian();
    if (fault) voltageVar -= 0.2;
    const freqVar = 0.2 * Math.sin(2 * Math.PI * 0.05 * t) + 0.1 * rng.nextGaussian();
    const powerVar = 0.3 * Math.sin(2 * Math.PI * 0.02 * t) + 0.1 * rng.nextGaussian();
    const hourly = Math.sin((2 * Math.PI * t) / 3600);

    const voltage = BASE_VOLTAGE_V * (1 + voltageVar);
    const activePower = BASE_POWER_W * (1 + powerVar);
    const loadDemand = BASE_POWER_W * (0.7 + 0.3 * hourly);

    return {
      busVoltage: voltage,
      busFrequency: BASE_FREQUENCY_HZ + freqVar,
      activePower,
      reactivePower: BASE_POWER_W * 0.3 * (1 + 0.5 * powerVar),
      currentMagnitude: Math.abs((activePower / voltage) * Math.sqrt(3)),
      currentPhase: 30 * Math.sin(2 * Math.PI * 0.03 * t),
      temperature: 25 + 10 * hourly + 2 * rng.nextGaussian(),
      loadDemand,
      generationOutput: loadDemand * (1.05 + 0.05 * rng.nextGaussian()),
      gridStabilityIndex: 1 - 0.1 * Math.abs(voltageVar) - 0.1 * Math.abs(freqVar / BASE_FREQUENCY_HZ),
      faultIndicator: fault,
    };
  }
}
