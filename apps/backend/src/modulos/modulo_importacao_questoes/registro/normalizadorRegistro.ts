/**
 * Normalizador de registros: transforma entradas heterogeneas (candidatos do
 * segmentador ou JSON legado) em `RegistroQuestao` canonico, ou rejeita.
 *
 * Rejeicao e resultado, nunca excecao. O portao roda na ordem
 * enunciado -> alternativas -> resposta e para no primeiro motivo.
 */
import { z } from 'zod';
import { chaveBusca, normalizarEspacos } from '../../../compartilhado/utilidades/texto';
import { calcularImpressaoDigital } from '../deduplicacao/deduplicador';
import {
  DISCIPLINA_NAO_CLASSIFICADA,
  LETRAS_ALTERNATIVAS,
  MINIMO_ALTERNATIVAS,
  SENTINELA_REVISAO,
  TAMANHO_MINIMO_ENUNCIADO,
  TOPICO_PADRAO,
  ehLetraAlternativa,
  type Alternativas,
  type CandidatoQuestao,
  type Dificuldade,
  type RegistroQuestao,
  type RespostaCorreta,
  type ResultadoNormalizacao
} from '../tipos';
import { classificarDisciplina } from './classificadorDisciplina';

export type EntradaRegistro = Record<string, unknown>;

export type ContextoNormalizacao = {
  fonteId: string;
  /** Usado quando a entrada nao traz numero proprio. */
  numeroPadrao: number;
};

/** Nome canonico -> nomes aceitos, em ordem de prioridade. */
export const ALIASES_CAMPOS = {
  enunciado: ['enunciado', 'statement', 'texto', 'text', 'question_text', 'pergunta', 'prompt', 'question'],
  alternativas: ['alternativas', 'alternatives', 'opcoes', 'options'],
  respostaCorreta: ['respostaCorreta', 'correctAnswer', 'gabarito', 'resposta_correta', 'alternativa_correta', 'answer'],
  disciplina: ['disciplina', 'discipline', 'materia', 'subject'],
  topico: ['topico', 'topic', 'assunto'],
  explicacao: ['explicacao', 'explanation', 'comentario', 'explicacao_detalhada'],
  fundamentacaoLegal: ['fundamentacaoLegal', 'legalBasis', 'fundamentacao', 'fundamentacao_legal', 'base_legal'],
  dificuldade: ['dificuldade', 'difficulty'],
  anoProva: ['anoProva', 'examYear', 'ano_prova', 'ano'],
  tags: ['tags'],
  numero: ['numero', 'number', 'numero_original']
} as const satisfies Record<string, readonly string[]>;

type CampoCanonico = keyof typeof ALIASES_CAMPOS;

function lerCampo(entrada: EntradaRegistro, campo: CampoCanonico): unknown {
  for (const alias of ALIASES_CAMPOS[campo]) {
    const valor = entrada[alias];
    if (valor === undefined || valor === null) continue;
    if (typeof valor === 'string' && !valor.trim()) continue;
    return valor;
  }
  return undefined;
}

function textoOpcional(valor: unknown): string {
  if (typeof valor === 'string') return normalizarEspacos(valor);
  if (typeof valor === 'number' && Number.isFinite(valor)) return String(valor);
  return '';
}

/** Objeto letra -> texto, lista de textos ou colunas `alternativa_a..e`. */
function coletarAlternativas(entrada: EntradaRegistro): Record<string, unknown> | null {
  const bruto = lerCampo(entrada, 'alternativas');

  if (Array.isArray(bruto)) {
    const saida: Record<string, unknown> = {};
    bruto.forEach((texto, indice) => {
      saida[LETRAS_ALTERNATIVAS[indice] ?? `#${indice}`] = texto;
    });
    return saida;
  }

  if (bruto && typeof bruto === 'object') {
    const saida: Record<string, unknown> = {};
    for (const [chave, texto] of Object.entries(bruto)) {
      saida[chave.trim().toUpperCase()] = texto;
    }
    return saida;
  }

  if (bruto !== undefined) return null;

  const legado: Record<string, unknown> = {};
  for (const letra of LETRAS_ALTERNATIVAS) {
    const texto = entrada[`alternativa_${letra.toLowerCase()}`];
    if (texto !== undefined && texto !== null && texto !== '') legado[letra] = texto;
  }
  return legado;
}

const esquemaEnunciado = z
  .string()
  .transform(normalizarEspacos)
  .pipe(z.string().min(TAMANHO_MINIMO_ENUNCIADO, `Enunciado com menos de ${TAMANHO_MINIMO_ENUNCIADO} caracteres`));

const esquemaTextoAlternativa = z.string().transform(normalizarEspacos).pipe(z.string().min(1, 'Alternativa vazia'));

const esquemaAlternativas = z
  .object({
    A: esquemaTextoAlternativa.optional(),
    B: esquemaTextoAlternativa.optional(),
    C: esquemaTextoAlternativa.optional(),
    D: esquemaTextoAlternativa.optional(),
    E: esquemaTextoAlternativa.optional()
  })
  .strict()
  .refine((alternativas) => Object.values(alternativas).filter(Boolean).length >= MINIMO_ALTERNATIVAS, {
    message: `Menos de ${MINIMO_ALTERNATIVAS} alternativas`
  });

const esquemaResposta = z
  .string()
  .transform((valor) =>
    normalizarEspacos(valor)
      .toUpperCase()
      .replace(/^(?:LETRA|ALTERNATIVA)\s+/, '')
  );

function primeiraMensagem(erro: z.ZodError): string {
  return erro.issues[0]?.message ?? 'invalido';
}

function normalizarResposta(bruto: unknown, alternativas: Alternativas): RespostaCorreta | null {
  if (bruto === undefined) return SENTINELA_REVISAO;
  const resultado = esquemaResposta.safeParse(bruto);
  if (!resultado.success) return null;
  const valor = resultado.data;
  if (valor === SENTINELA_REVISAO) return SENTINELA_REVISAO;
  if (ehLetraAlternativa(valor) && alternativas[valor] !== undefined) return valor;
  return null;
}

export function normalizarDificuldade(valor: unknown): Dificuldade {
  const chave = typeof valor === 'string' ? chaveBusca(valor) : '';
  if (chave === 'facil' || chave === 'easy') return 'facil';
  if (chave === 'dificil' || chave === 'hard') return 'dificil';
  return 'medio';
}

function normalizarAno(valor: unknown): number | undefined {
  const ano = typeof valor === 'number' ? valor : typeof valor === 'string' ? Number(valor.trim()) : Number.NaN;
  return Number.isInteger(ano) && ano >= 1900 && ano <= 2100 ? ano : undefined;
}

function normalizarTags(valor: unknown): string[] {
  const brutas = Array.isArray(valor) ? valor : typeof valor === 'string' ? valor.split(',') : [];
  const vistas = new Set<string>();
  for (const tag of brutas) {
    const texto = textoOpcional(tag);
    if (texto) vistas.add(texto);
  }
  return [...vistas];
}

function normalizarNumero(valor: unknown, porPadrao: number): number {
  const numero = typeof valor === 'number' ? valor : typeof valor === 'string' ? Number(valor.trim()) : Number.NaN;
  return Number.isInteger(numero) && numero > 0 ? numero : porPadrao;
}

export function normalizarRegistro(entrada: EntradaRegistro, contexto: ContextoNormalizacao): ResultadoNormalizacao {
  const enunciado = esquemaEnunciado.safeParse(lerCampo(entrada, 'enunciado') ?? '');
  if (!enunciado.success) {
    return { aceito: false, motivo: 'ENUNCIADO_INVALIDO', detalhe: primeiraMensagem(enunciado.error) };
  }

  const coletadas = coletarAlternativas(entrada);
  if (!coletadas) {
    return { aceito: false, motivo: 'ALTERNATIVAS_INVALIDAS', detalhe: 'Formato de alternativas nao reconhecido' };
  }
  const alternativas = esquemaAlternativas.safeParse(coletadas);
  if (!alternativas.success) {
    return { aceito: false, motivo: 'ALTERNATIVAS_INVALIDAS', detalhe: primeiraMensagem(alternativas.error) };
  }

  const respostaBruta = lerCampo(entrada, 'respostaCorreta');
  const respostaCorreta = normalizarResposta(respostaBruta, alternativas.data);
  if (!respostaCorreta) {
    return {
      aceito: false,
      motivo: 'RESPOSTA_INVALIDA',
      detalhe: `Resposta "${textoOpcional(respostaBruta)}" fora das alternativas`
    };
  }

  const disciplinaInformada = textoOpcional(lerCampo(entrada, 'disciplina'));
  const anoProva = normalizarAno(lerCampo(entrada, 'anoProva'));

  const registro: RegistroQuestao = Object.freeze({
    fonteId: contexto.fonteId,
    numero: normalizarNumero(lerCampo(entrada, 'numero'), contexto.numeroPadrao),
    disciplina: disciplinaInformada || classificarDisciplina(enunciado.data) || DISCIPLINA_NAO_CLASSIFICADA,
    topico: textoOpcional(lerCampo(entrada, 'topico')) || TOPICO_PADRAO,
    enunciado: enunciado.data,
    alternativas: Object.freeze({ ...alternativas.data }),
    respostaCorreta,
    explicacao: textoOpcional(lerCampo(entrada, 'explicacao')),
    fundamentacaoLegal: textoOpcional(lerCampo(entrada, 'fundamentacaoLegal')),
    dificuldade: normalizarDificuldade(lerCampo(entrada, 'dificuldade')),
    ...(anoProva === undefined ? {} : { anoProva }),
    tags: Object.freeze(normalizarTags(lerCampo(entrada, 'tags'))),
    hashConteudo: calcularImpressaoDigital(enunciado.data)
  });

  return { aceito: true, registro };
}

// "(OAB/Exame XXXV - 2022)", "(FGV - 2019)": referencia da prova, nao texto da questao.
const REFERENCIA_PROVA = /\(\s*(?:OAB|FGV|Exame)\b[^)]*\)/gi;
const ANO = /\b(19|20)\d{2}\b/;

/**
 * Converte um candidato do segmentador na entrada do normalizador. Sem numero
 * explicito, o ordinal do candidato na fonte vira o numero.
 */
export function candidatoParaEntrada(candidato: CandidatoQuestao, ordinal: number): EntradaRegistro {
  const texto = normalizarEspacos(candidato.linhasEnunciado.join(' '));
  let anoProva: number | undefined;
  for (const referencia of texto.match(REFERENCIA_PROVA) ?? []) {
    const ano = ANO.exec(referencia)?.[0];
    if (ano && anoProva === undefined) anoProva = Number.parseInt(ano, 10);
  }

  return {
    numero: candidato.numero ?? ordinal,
    enunciado: normalizarEspacos(texto.replace(REFERENCIA_PROVA, ' ')),
    alternativas: { ...candidato.alternativas },
    respostaCorreta: candidato.respostaCorreta,
    ...(anoProva === undefined ? {} : { anoProva })
  };
}
