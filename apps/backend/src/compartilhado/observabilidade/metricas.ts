/**
 * metricas
 *
 * Contadores em memoria exportados em formato texto do Prometheus.
 * Nomes de metricas sao contrato operacional: nao renomear sem migrar painéis.
 */
import type { EtapaImportacao } from '../../modulos/modulo_importacao_questoes/tipos';

const inicioDoProcesso = Date.now();

type ChaveSolicitacao = `${string}|${string}|${number}`;

const solicitacoesPorRota = new Map<ChaveSolicitacao, number>();
const solicitacoesTotais = { total: 0, erros: 0 };
const etapasImportacaoDuracaoMs = new Map<string, number>();
const etapasImportacaoTotais = new Map<string, number>();
const importacoesTotais = {
  execucoes: 0,
  fontesComFalha: 0,
  registrosAdmitidos: 0,
  registrosRejeitados: 0,
  duplicatasDescartadas: 0
};

const cubetasMs = [25, 50, 100, 250, 500, 1000, 2500, 5000];
const histogramaDuracao = new Map<number, number>();

for (const cubeta of cubetasMs) histogramaDuracao.set(cubeta, 0);
histogramaDuracao.set(Infinity, 0);

function incrementarCubeta(duracaoMs: number) {
  for (const cubeta of cubetasMs) {
    if (duracaoMs <= cubeta) {
      histogramaDuracao.set(cubeta, (histogramaDuracao.get(cubeta) ?? 0) + 1);
      return;
    }
  }
  histogramaDuracao.set(Infinity, (histogramaDuracao.get(Infinity) ?? 0) + 1);
}

export function registrarRequisicaoHttp(method: string, route: string, status: number, durationMs: number) {
  const metodo = String(method || 'GET').toUpperCase();
  const rota = String(route || '/');
  const estado = Number.isFinite(status) ? status : 500;
  const chave: ChaveSolicitacao = `${metodo}|${rota}|${estado}`;
  solicitacoesPorRota.set(chave, (solicitacoesPorRota.get(chave) ?? 0) + 1);

  solicitacoesTotais.total += 1;
  if (estado >= 500) solicitacoesTotais.erros += 1;
  incrementarCubeta(Math.max(0, Math.round(durationMs)));
}

export function registrarEtapaImportacao(etapa: EtapaImportacao, duracaoMs: number, exito: boolean) {
  const chaveTotal = `${etapa}|${exito ? 'ok' : 'error'}`;
  etapasImportacaoTotais.set(chaveTotal, (etapasImportacaoTotais.get(chaveTotal) ?? 0) + 1);
  etapasImportacaoDuracaoMs.set(etapa, (etapasImportacaoDuracaoMs.get(etapa) ?? 0) + Math.max(0, duracaoMs));
}

export function registrarExecucaoImportacao(resumo: {
  fontesComFalha: number;
  registrosAdmitidos: number;
  registrosRejeitados: number;
  duplicatasDescartadas: number;
}) {
  importacoesTotais.execucoes += 1;
  importacoesTotais.fontesComFalha += resumo.fontesComFalha;
  importacoesTotais.registrosAdmitidos += resumo.registrosAdmitidos;
  importacoesTotais.registrosRejeitados += resumo.registrosRejeitados;
  importacoesTotais.duplicatasDescartadas += resumo.duplicatasDescartadas;
}

function contador(linhas: string[], nome: string, ajuda: string, valor: number) {
  linhas.push(`# HELP ${nome} ${ajuda}`);
  linhas.push(`# TYPE ${nome} counter`);
  linhas.push(`${nome} ${valor}`);
  linhas.push('');
}

export function exportarMetricasPrometheus(): string {
  const linhas: string[] = [];
  linhas.push('# HELP bancoquestoes_http_requests_total Total de requisicoes HTTP processadas');
  linhas.push('# TYPE bancoquestoes_http_requests_total counter');
  for (const [chave, valor] of solicitacoesPorRota.entries()) {
    const [metodo, rota, estado] = chave.split('|');
    linhas.push(`bancoquestoes_http_requests_total{method="${metodo}",route="${rota}",status="${estado}"} ${valor}`);
  }
  linhas.push('');

  linhas.push('# HELP bancoquestoes_http_request_duration_ms_bucket Histograma simples de latencia por buckets');
  linhas.push('# TYPE bancoquestoes_http_request_duration_ms_bucket counter');
  for (const [cubeta, valor] of histogramaDuracao.entries()) {
    const le = cubeta === Infinity ? '+Inf' : String(cubeta);
    linhas.push(`bancoquestoes_http_request_duration_ms_bucket{le="${le}"} ${valor}`);
  }
  linhas.push('');

  linhas.push('# HELP bancoquestoes_process_uptime_seconds Uptime do processo');
  linhas.push('# TYPE bancoquestoes_process_uptime_seconds gauge');
  linhas.push(`bancoquestoes_process_uptime_seconds ${Math.floor((Date.now() - inicioDoProcesso) / 1000)}`);
  linhas.push('');

  contador(linhas, 'bancoquestoes_http_errors_total', 'Total de respostas 5xx', solicitacoesTotais.erros);

  linhas.push('# HELP bancoquestoes_importacao_stage_total Execucoes de etapas do pipeline de importacao');
  linhas.push('# TYPE bancoquestoes_importacao_stage_total counter');
  for (const [chave, valor] of etapasImportacaoTotais.entries()) {
    const [etapa, resultado] = chave.split('|');
    linhas.push(`bancoquestoes_importacao_stage_total{stage="${etapa}",result="${resultado}"} ${valor}`);
  }
  linhas.push('');

  linhas.push('# HELP bancoquestoes_importacao_stage_duration_ms Duracao acumulada por etapa');
  linhas.push('# TYPE bancoquestoes_importacao_stage_duration_ms counter');
  for (const [etapa, valor] of etapasImportacaoDuracaoMs.entries()) {
    linhas.push(`bancoquestoes_importacao_stage_duration_ms{stage="${etapa}"} ${valor}`);
  }
  linhas.push('');

  contador(linhas, 'bancoquestoes_importacao_runs_total', 'Execucoes do pipeline de importacao', importacoesTotais.execucoes);
  contador(linhas, 'bancoquestoes_importacao_sources_failed_total', 'Fontes que falharam na leitura ou preparo', importacoesTotais.fontesComFalha);
  contador(linhas, 'bancoquestoes_importacao_records_admitted_total', 'Registros admitidos apos deduplicacao', importacoesTotais.registrosAdmitidos);
  contador(linhas, 'bancoquestoes_importacao_records_rejected_total', 'Registros rejeitados na validacao', importacoesTotais.registrosRejeitados);
  contador(linhas, 'bancoquestoes_importacao_duplicates_total', 'Duplicatas descartadas', importacoesTotais.duplicatasDescartadas);

  return linhas.join('\n');
}
