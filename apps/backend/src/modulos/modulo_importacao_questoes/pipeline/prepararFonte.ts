/**
 * Preparo de uma fonte: etapa pura, sem efeito fora do valor devolvido.
 *
 * paginas -> linhas normalizadas -> candidatos -> registros -> cruzamento com
 * o gabarito. O executor so incorpora o resultado depois que esta etapa
 * termina, entao uma fonte que falha no meio nao deixa nada para tras.
 */
import type { ConfiguracaoExtracao } from '../configuracaoExtracao';
import { ErroFonteIlegivel } from '../errosImportacao';
import { extrairGabarito } from '../gabarito/extratorGabarito';
import { limparLinha, normalizarLinhas, paginasParaLinhas } from '../normalizacao/normalizadorTexto';
import { candidatoParaEntrada, normalizarRegistro } from '../registro/normalizadorRegistro';
import { segmentarQuestoes } from '../segmentacao/segmentadorQuestoes';
import {
  SENTINELA_REVISAO,
  type MapaGabarito,
  type MotivoRejeicao,
  type PaginaBruta,
  type RegistroQuestao
} from '../tipos';

export type Rejeicao = { numero: number; motivo: MotivoRejeicao; detalhe: string };

export type FontePreparada = {
  candidatos: number;
  registros: RegistroQuestao[];
  rejeicoes: Rejeicao[];
  entradasGabarito: number;
  gabaritosIncompativeis: number;
};

type ResultadoCruzamento = { registro: RegistroQuestao; incompativel: boolean };

/**
 * O gabarito so substitui a sentinela, e so com uma letra que exista entre as
 * alternativas do registro. Resposta ja determinada nunca e sobrescrita.
 */
export function cruzarComGabarito(
  registro: RegistroQuestao,
  numeroExplicito: number | undefined,
  gabarito: MapaGabarito
): ResultadoCruzamento {
  if (registro.respostaCorreta !== SENTINELA_REVISAO || numeroExplicito === undefined) {
    return { registro, incompativel: false };
  }
  const letra = gabarito.get(numeroExplicito);
  if (!letra) return { registro, incompativel: false };
  if (registro.alternativas[letra] === undefined) return { registro, incompativel: true };
  return { registro: Object.freeze({ ...registro, respostaCorreta: letra }), incompativel: false };
}

export function prepararFonte(
  fonteId: string,
  paginas: readonly PaginaBruta[],
  config: ConfiguracaoExtracao
): FontePreparada {
  const linhasBrutas = paginasParaLinhas(paginas);
  const linhas = normalizarLinhas(linhasBrutas, config);
  // O gabarito le as linhas sem o filtro de ruido: tabelas de numeros e letras
  // soltas seriam descartadas como numero de pagina ou titulo.
  const gabarito = extrairGabarito(linhasBrutas.map(limparLinha).filter(Boolean), config);

  const registros: RegistroQuestao[] = [];
  const rejeicoes: Rejeicao[] = [];
  let candidatos = 0;
  let gabaritosIncompativeis = 0;

  for (const candidato of segmentarQuestoes(linhas, config)) {
    candidatos += 1;
    const entrada = candidatoParaEntrada(candidato, candidatos);
    const resultado = normalizarRegistro(entrada, { fonteId, numeroPadrao: candidatos });
    if (!resultado.aceito) {
      rejeicoes.push({ numero: candidato.numero ?? candidatos, motivo: resultado.motivo, detalhe: resultado.detalhe });
      continue;
    }
    const cruzado = cruzarComGabarito(resultado.registro, candidato.numero, gabarito);
    if (cruzado.incompativel) gabaritosIncompativeis += 1;
    registros.push(cruzado.registro);
  }

  return { candidatos, registros, rejeicoes, entradasGabarito: gabarito.size, gabaritosIncompativeis };
}

/** Aceita `{ questoes: [...] }` ou uma lista direta. */
export function prepararFonteLegada(fonteId: string, conteudo: unknown): FontePreparada {
  const entradas = Array.isArray(conteudo)
    ? conteudo
    : conteudo && typeof conteudo === 'object' && 'questoes' in conteudo && Array.isArray(conteudo.questoes)
      ? conteudo.questoes
      : null;
  if (!entradas) {
    throw new ErroFonteIlegivel(fonteId, 'Conjunto legado sem lista de questoes');
  }

  const registros: RegistroQuestao[] = [];
  const rejeicoes: Rejeicao[] = [];
  entradas.forEach((entrada: unknown, indice: number) => {
    const numero = indice + 1;
    if (!entrada || typeof entrada !== 'object' || Array.isArray(entrada)) {
      rejeicoes.push({ numero, motivo: 'ENUNCIADO_INVALIDO', detalhe: 'Entrada nao e um objeto' });
      return;
    }
    const resultado = normalizarRegistro(Object.fromEntries(Object.entries(entrada)), {
      fonteId,
      numeroPadrao: numero
    });
    if (resultado.aceito) registros.push(resultado.registro);
    else rejeicoes.push({ numero, motivo: resultado.motivo, detalhe: resultado.detalhe });
  });

  return { candidatos: entradas.length, registros, rejeicoes, entradasGabarito: 0, gabaritosIncompativeis: 0 };
}
