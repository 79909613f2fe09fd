/**
 * logger
 *
 * Logging estruturado (uma linha JSON por evento) para a API e para os scripts
 * de importacao.
 */
export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

type Meta = Record<string, unknown>;

const servico = 'banco-questoes';

function serializarErro(erro: unknown) {
  if (!erro) return undefined;
  if (erro instanceof Error) {
    return {
      name: erro.name,
      message: erro.message,
      stack: erro.stack
    };
  }
  return { value: String(erro) };
}

function nivelPadrao(level: NivelLog): 'info' | 'warn' | 'error' {
  if (level === 'warn') return 'warn';
  if (level === 'error') return 'error';
  return 'info';
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  // Em testes o ruido atrapalha a leitura do relatorio do Vitest.
  if (process.env.NODE_ENV === 'test' && process.env.LOG_EM_TESTES !== '1') return;

  const levelStd = nivelPadrao(level);
  const entry = {
    timestamp: new Date().toISOString(),
    service: servico,
    env: process.env.NODE_ENV ?? 'development',
    level: levelStd,
    message: msg,
    ...meta
  };

  const line = JSON.stringify(entry);
  if (levelStd === 'error') console.error(line);
  else if (levelStd === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, erro?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarErro(erro) });
}
