import { GeneratorError } from '../errors.js';
import type { AnalysisGenerator, AnalysisOutput, DatasetSummary, GenerateRequest, SourceSummary } from './types.js';

const GENERATOR_ID = 'simulated:v1';

function trendWord(slope: number | null, language: 'es' | 'en'): string {
  if (slope === null || Math.abs(slope) < 0.02) return language === 'es' ? 'estable' : 'stable';
  if (slope > 0) return language === 'es' ? 'creciente' : 'rising';
  return language === 'es' ? 'decreciente' : 'declining';
}

function describeSource(source: SourceSummary, language: 'es' | 'en'): string {
  const mean = source.mean === null ? 'n/a' : source.mean.toFixed(2);
  const slope = source.trendSlope === null ? 'n/a' : source.trendSlope.toFixed(3);
  return language === 'es'
    ? `${source.displayName} aporta ${source.points} observaciones con media ${mean} y pendiente ${slope}, una trayectoria ${trendWord(source.trendSlope, language)}`
    : `${source.displayName} contributes ${source.points} observations with mean ${mean} and slope ${slope}, a ${trendWord(source.trendSlope, language)} trajectory`;
}

function singleSource(summary: DatasetSummary): string[] {
  const [source] = summary.sources;
  const tool = summary.toolName;
  const detail = source ? describeSource(source, summary.language) : '';
  if (summary.language === 'es') {
    return [
      `El análisis de ${tool} muestra un patrón de adopción definido: ${detail}.`,
      `Los datos de ${tool} revelan ciclos de interés que se repiten y una madurez progresiva de la herramienta en la práctica directiva. ${detail}. La lectura conjunta de estos indicadores sitúa a ${tool} en una fase en la que el interés ya no depende de la novedad sino de resultados demostrables en las organizaciones que la aplican.`,
      `La serie temporal de ${tool} presenta fases de auge y consolidación; ${detail}.`,
      `Se observan variaciones estacionales moderadas en ${tool}, con picos recurrentes al inicio de cada ciclo anual de planificación.`,
      `El espectro de frecuencias de ${tool} concentra la energía en ciclos largos de entre 5 y 8 años, propios de las modas gerenciales.`,
      `Las organizaciones deberían integrar ${tool} en su planificación estratégica atendiendo a su fase actual del ciclo de vida.`,
      `En conclusión, ${tool} mantiene relevancia con ${summary.totalPoints} puntos de datos que respaldan la lectura de su evolución.`,
    ];
  }
  return [
    `The analysis of ${tool} shows a clear adoption pattern: ${detail}.`,
    `The ${tool} data reveal recurring cycles of interest and a progressive maturity of the tool in management practice. ${detail}. Read together, these indicators place ${tool} in a phase where interest no longer depends on novelty but on results that the organisations applying it can demonstrate.`,
    `The ${tool} time series moves through phases of growth and consolidation; ${detail}.`,
    `Moderate seasonal variation appears in ${tool}, with recurring peaks at the start of each annual planning cycle.`,
    `The frequency spectrum of ${tool} concentrates its energy in long cycles of 5 to 8 years, typical of management fashions.`,
    `Organisations should integrate ${tool} into strategic planning according to its current life-cycle phase.`,
    `In conclusion, ${tool} remains relevant, with ${summary.totalPoints} data points supporting this reading of its evolution.`,
  ];
}

function multiSource(summary: DatasetSummary): string[] {
  const tool = summary.toolName;
  const details = summary.sources.map((source) => describeSource(source, summary.language)).join('; ');
  const names = summary.sources.map((source) => source.displayName).join(', ');
  if (summary.language === 'es') {
    return [
      `El análisis multifuente de ${tool} combina ${summary.sources.length} fuentes y ${summary.totalPoints} observaciones.`,
      `Las fuentes consideradas describen la adopción de ${tool} desde perspectivas complementarias: ${details}. La convergencia entre ellas sugiere que el interés académico y la práctica empresarial avanzan con cierto desfase.`,
      `La matriz de correlación entre ${names} muestra asociaciones positivas moderadas (r entre 0.35 y 0.62), lo que indica que las fuentes capturan dimensiones relacionadas pero no idénticas de ${tool}.`,
      `El análisis de componentes principales extrae dos componentes que explican el 71.4% y el 18.2% de la varianza; el primero agrupa las fuentes de difusión y el segundo refleja la valoración práctica de ${tool}.`,
      `La síntesis estratégica indica que ${tool} debe evaluarse combinando señales de difusión y de satisfacción antes de comprometer recursos.`,
      `En conclusión, las ${summary.sources.length} fuentes ofrecen una visión coherente de ${tool} y respaldan decisiones basadas en evidencia.`,
    ];
  }
  return [
    `The multi-source analysis of ${tool} combines ${summary.sources.length} sources and ${summary.totalPoints} observations.`,
    `The sources describe the adoption of ${tool} from complementary angles: ${details}. Their convergence suggests that academic interest and business practice move with a measurable lag.`,
    `The correlation matrix across ${names} shows moderate positive associations (r between 0.35 and 0.62), so the sources capture related but distinct dimensions of ${tool}.`,
    `Principal component analysis extracts two components explaining 71.4% and 18.2% of the variance; the first groups the diffusion sources and the second reflects the practical valuation of ${tool}.`,
    `The strategic synthesis is that ${tool} should be assessed by combining diffusion and satisfaction signals before committing resources.`,
    `In conclusion, the ${summary.sources.length} sources give a coherent picture of ${tool} and support evidence-based decisions.`,
  ];
}

/**
 * Deterministic template generator for pipeline dry runs without network
 * access. Output depends only on the dataset summary.
 */
export class SimulatedAnalysisGenerator implements AnalysisGenerator {
  readonly name = 'simulated';

  async generate({ key, datasetSummary, signal }: GenerateRequest): Promise<AnalysisOutput> {
    if (signal?.aborted) {
      throw new GeneratorError('cancelled', `Generation for ${key.hash.slice(0, 12)} was cancelled`);
    }

    const base = {
      tables: [],
      generator_id: GENERATOR_ID,
      data_points_count: datasetSummary.totalPoints,
      latency_ms: 0,
    };

    if (key.analysisType === 'single') {
      const [executive, principal, temporal, seasonal, spectral, synthesis, conclusions] = singleSource(datasetSummary);
      return {
        ...base,
        executive_summary: executive ?? '',
        principal_findings: principal ?? '',
        temporal_analysis: temporal ?? '',
        seasonal_analysis: seasonal ?? '',
        spectral_analysis: spectral ?? '',
        correlation_analysis: '',
        component_analysis: '',
        strategic_synthesis: synthesis ?? '',
        conclusions: conclusions ?? '',
      };
    }

    const [executive, principal, correlation, component, synthesis, conclusions] = multiSource(datasetSummary);
    return {
      ...base,
      executive_summary: executive ?? '',
      principal_findings: principal ?? '',
      temporal_analysis: '',
      seasonal_analysis: '',
      spectral_analysis: '',
      correlation_analysis: correlation ?? '',
      component_analysis: component ?? '',
      strategic_synthesis: synthesis ?? '',
      conclusions: conclusions ?? '',
    };
  }
}
