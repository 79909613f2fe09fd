/**
 * Executor da importacao: percorre as fontes uma a uma, prepara cada uma e so
 * entao incorpora seus registros ao deduplicador unico da execucao.
 *
 * Falha de uma fonte fica isolada nela (conta em `fontesComFalha`, vai para o
 * log e a execucao segue); id repetido conta como falha da repeticao.
 * `ErroPipelineFatal` interrompe tudo.
 */
import { registrarEtapaImportacao, registrarExecucaoImportacao } from '../../../compartilhado/observabilidade/metricas';
import { log, logError } from '../../../infraestrutura/logging/logger';
import {
  criarConfiguracaoExtracao,
  type ConfiguracaoExtracao,
  type ConfiguracaoExtracaoParcial
} from '../configuracaoExtracao';
import { Deduplicador } from '../deduplicacao/deduplicador';
import { ErroPipelineFatal } from '../errosImportacao';
import {
  SENTINELA_REVISAO,
  ehFonteLegada,
  type EtapaImportacao,
  type FonteImportacao,
  type RegistroEtapa,
  type RelatorioImportacao,
  type ResultadoImportacao,
  type ResumoFonte
} from '../tipos';
import { prepararFonte, prepararFonteLegada, type FontePreparada } from './prepararFonte';

export type OpcoesImportacao = {
  configuracao?: ConfiguracaoExtracao | ConfiguracaoExtracaoParcial;
  /** Identificador para correlacionar as linhas de log da execucao. */
  idExecucao?: string;
};

async function executarComMetricas<T>(
  etapa: EtapaImportacao,
  fonteId: string | undefined,
  executor: () => T | Promise<T>,
  etapas: RegistroEtapa[]
): Promise<T> {
  const inicio = Date.now();
  try {
    const resultado = await executor();
    const duracaoMs = Date.now() - inicio;
    registrarEtapaImportacao(etapa, duracaoMs, true);
    etapas.push({ etapa, ...(fonteId ? { fonteId } : {}), duracaoMs, exito: true });
    return resultado;
  } catch (erro) {
    const duracaoMs = Date.now() - inicio;
    registrarEtapaImportacao(etapa, duracaoMs, false);
    etapas.push({ etapa, ...(fonteId ? { fonteId } : {}), duracaoMs, exito: false });
    throw erro;
  }
}

export function criarRelatorioVazio(): RelatorioImportacao {
  return {
    fontesProcessadas: 0,
    fontesComFalha: 0,
    candidatosEncontrados: 0,
    registrosRejeitados: 0,
    duplicatasDescartadas: 0,
    registrosAdmitidos: 0,
    candidatosPorFonte: {},
    detalhesPorFonte: {},
    rejeicoesPorMotivo: { ENUNCIADO_INVALIDO: 0, ALTERNATIVAS_INVALIDAS: 0, RESPOSTA_INVALIDA: 0 },
    fontesSemQuestoes: [],
    fontesSemGabarito: [],
    registrosPendentesRevisao: 0,
    gabaritosIncompativeis: 0,
    duplicatasComRespostaDivergente: 0,
    duracaoMs: 0
  };
}

function resumoVazio(): ResumoFonte {
  return { candidatos: 0, rejeitados: 0, duplicatas: 0, admitidos: 0, entradasGabarito: 0, pendentesRevisao: 0 };
}

function mensagemErro(erro: unknown): string {
  return erro instanceof Error ? erro.message : String(erro);
}

async function prepararImportacao(
  fonte: FonteImportacao,
  config: ConfiguracaoExtracao,
  etapas: RegistroEtapa[]
): Promise<FontePreparada> {
  if (ehFonteLegada(fonte)) {
    const conteudo = await executarComMetricas('leitura', fonte.id, () => fonte.lerEntradas(), etapas);
    return executarComMetricas('legado', fonte.id, () => prepararFonteLegada(fonte.id, conteudo), etapas);
  }
  const paginas = await executarComMetricas('leitura', fonte.id, () => fonte.lerPaginas(), etapas);
  return executarComMetricas('preparo', fonte.id, () => prepararFonte(fonte.id, paginas, config), etapas);
}

/**
 * Executa a importacao completa. O deduplicador e unico por execucao: a mesma
 * questao vinda de duas fontes e admitida uma vez, pela primeira fonte.
 */
export async function executarImportacao(
  fontes: Iterable<FonteImportacao>,
  opcoes: OpcoesImportacao = {}
): Promise<ResultadoImportacao> {
  const inicio = Date.now();
  const config = criarConfiguracaoExtracao(opcoes.configuracao);
  const idExecucao = opcoes.idExecucao;
  const deduplicador = new Deduplicador();
  const relatorio = criarRelatorioVazio();
  const etapas: RegistroEtapa[] = [];
  const ocorrencias = new Map<string, number>();

  for (const fonte of fontes) {
    const ocorrencia = (ocorrencias.get(fonte.id) ?? 0) + 1;
    ocorrencias.set(fonte.id, ocorrencia);
    if (ocorrencia > 1) {
      // A primeira ocorrencia ja ocupa `detalhesPorFonte[id]`.
      const falha = `Fonte repetida na mesma execucao: ${fonte.id}`;
      relatorio.fontesComFalha += 1;
      relatorio.detalhesPorFonte[`${fonte.id}#${ocorrencia}`] = { ...resumoVazio(), falha };
      log('warn', falha, { fonteId: fonte.id, ocorrencia, idExecucao });
      continue;
    }

    const preparada = await prepararImportacao(fonte, config, etapas).catch((erro: unknown) => {
      if (erro instanceof ErroPipelineFatal) throw erro;
      relatorio.fontesComFalha += 1;
      relatorio.detalhesPorFonte[fonte.id] = { ...resumoVazio(), falha: mensagemErro(erro) };
      logError('Falha ao importar fonte', erro, { fonteId: fonte.id, idExecucao });
      return null;
    });
    if (!preparada) continue;

    const resumo = await executarComMetricas(
      'deduplicacao',
      fonte.id,
      () => {
        const parcial = resumoVazio();
        parcial.candidatos = preparada.candidatos;
        parcial.rejeitados = preparada.rejeicoes.length;
        parcial.entradasGabarito = preparada.entradasGabarito;
        for (const registro of preparada.registros) {
          if (deduplicador.admitir(registro) === 'duplicado') {
            parcial.duplicatas += 1;
            continue;
          }
          parcial.admitidos += 1;
          if (registro.respostaCorreta === SENTINELA_REVISAO) parcial.pendentesRevisao += 1;
        }
        return parcial;
      },
      etapas
    );

    relatorio.fontesProcessadas += 1;
    relatorio.candidatosEncontrados += resumo.candidatos;
    relatorio.registrosRejeitados += resumo.rejeitados;
    relatorio.duplicatasDescartadas += resumo.duplicatas;
    relatorio.registrosAdmitidos += resumo.admitidos;
    relatorio.registrosPendentesRevisao += resumo.pendentesRevisao;
    relatorio.gabaritosIncompativeis += preparada.gabaritosIncompativeis;
    relatorio.candidatosPorFonte[fonte.id] = resumo.candidatos;
    relatorio.detalhesPorFonte[fonte.id] = resumo;
    for (const rejeicao of preparada.rejeicoes) relatorio.rejeicoesPorMotivo[rejeicao.motivo] += 1;

    if (resumo.candidatos === 0) relatorio.fontesSemQuestoes.push(fonte.id);
    const semResposta =
      preparada.registros.length > 0 &&
      preparada.registros.every((registro) => registro.respostaCorreta === SENTINELA_REVISAO);
    if (!ehFonteLegada(fonte) && semResposta) relatorio.fontesSemGabarito.push(fonte.id);

    log('info', 'Fonte importada', { fonteId: fonte.id, idExecucao, ...resumo });
  }

  relatorio.duplicatasComRespostaDivergente = deduplicador.duplicatasComRespostaDivergente;
  relatorio.duracaoMs = Date.now() - inicio;

  registrarExecucaoImportacao({
    fontesComFalha: relatorio.fontesComFalha,
    registrosAdmitidos: relatorio.registrosAdmitidos,
    registrosRejeitados: relatorio.registrosRejeitados,
    duplicatasDescartadas: relatorio.duplicatasDescartadas
  });
  log('ok', 'Importacao concluida', {
    idExecucao,
    fontesProcessadas: relatorio.fontesProcessadas,
    fontesComFalha: relatorio.fontesComFalha,
    registrosAdmitidos: relatorio.registrosAdmitidos,
    duracaoMs: relatorio.duracaoMs
  });

  return { registros: deduplicador.registros(), relatorio, etapas };
}
