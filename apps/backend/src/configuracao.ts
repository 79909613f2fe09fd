/**
 * Configuracao centralizada do backend.
 */
import dotenv from 'dotenv';
import path from 'node:path';

// Dotenv v17 emite logs informativos; silenciados para manter testes e console limpos.
dotenv.config({
  quiet: true,
  path: path.resolve(__dirname, '..', '..', '..', '.env')
});

const entorno = process.env.NODE_ENV ?? 'development';
const mongoUri = process.env.MONGODB_URI ?? process.env.MONGO_URI ?? '';
const limiteJson = process.env.LIMITE_JSON ?? '10mb';
const corsOrigens = (process.env.CORS_ORIGENS ?? 'http://localhost:5173')
  .split(',')
  .map((origem) => origem.trim())
  .filter(Boolean);

export function lerNumeroSeguro(
  valor: unknown,
  porPadrao: number,
  { min, max }: { min?: number; max?: number } = {}
): number {
  if (valor === undefined || valor === null || String(valor).trim() === '') return porPadrao;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porPadrao;
  const limitadoMax = typeof max === 'number' ? Math.min(max, n) : n;
  return typeof min === 'number' ? Math.max(min, limitadoMax) : limitadoMax;
}

if (entorno === 'production' && !mongoUri) {
  throw new Error('MONGODB_URI e obrigatorio em producao');
}

const porta = lerNumeroSeguro(process.env.PORTA_API ?? process.env.PORT, 4000, { min: 1, max: 65535 });

const rateLimitWindowMs = lerNumeroSeguro(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000, {
  min: 1_000,
  max: 24 * 60 * 60 * 1000
});
const rateLimitLimit = lerNumeroSeguro(process.env.RATE_LIMIT_LIMIT, 300, { min: 1, max: 100_000 });

// Ajustes do pipeline de importacao. Os valores passam de novo pela validacao
// Zod de `criarConfiguracaoExtracao`.
const importacao = {
  tamanhoMinimoLinhaEnunciado: lerNumeroSeguro(process.env.IMPORTACAO_MIN_LINHA_ENUNCIADO, 15, { min: 1, max: 200 }),
  maximoQuestoes: lerNumeroSeguro(process.env.IMPORTACAO_MAXIMO_QUESTOES, 200, { min: 1, max: 100_000 }),
  janelaGabarito: lerNumeroSeguro(process.env.IMPORTACAO_JANELA_GABARITO, 40, { min: 1, max: 1_000 }),
  limiteMaiusculas: lerNumeroSeguro(process.env.IMPORTACAO_LIMITE_MAIUSCULAS, 40, { min: 5, max: 500 })
};

export const configuracao = {
  porta,
  mongoUri,
  entorno,
  limiteJson,
  corsOrigens,
  rateLimitWindowMs,
  rateLimitLimit,
  importacao
};
