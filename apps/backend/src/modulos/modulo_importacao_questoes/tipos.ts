/**
 * Tipos do pipeline de importacao de questoes.
 *
 * Fluxo: paginas brutas -> candidatos segmentados -> registros normalizados
 * -> (cruzamento com gabarito) -> conjunto deduplicado -> persistencia.
 */

export const LETRAS_ALTERNATIVAS = ['A', 'B', 'C', 'D', 'E'] as const;
export type LetraAlternativa = (typeof LETRAS_ALTERNATIVAS)[number];

export function ehLetraAlternativa(valor: unknown): valor is LetraAlternativa {
  return typeof valor === 'string' && (LETRAS_ALTERNATIVAS as readonly string[]).includes(valor);
}

// "Precisa de revisao": resposta ainda nao determinada. Nunca e um palpite.
export const SENTINELA_REVISAO = 'REVISAR';
export type RespostaCorreta = LetraAlternativa | typeof SENTINELA_REVISAO;

export const DIFICULDADES = ['facil', 'medio', 'dificil'] as const;
export type Dificuldade = (typeof DIFICULDADES)[number];

export const DISCIPLINA_NAO_CLASSIFICADA = 'Não classificada';
export const TOPICO_PADRAO = 'Geral';
export const TAMANHO_MINIMO_ENUNCIADO = 20;
export const MINIMO_ALTERNATIVAS = 4;

export type Alternativas = Partial<Record<LetraAlternativa, string>>;

export type PaginaBruta = {
  fonteId: string;
  indice: number;
  texto: string;
};

export type CandidatoQuestao = {
  numero?: number;
  linhasEnunciado: string[];
  alternativas: Alternativas;
  respostaCorreta: RespostaCorreta;
};

export type RegistroQuestao = Readonly<{
  fonteId: string;
  numero: number;
  disciplina: string;
  topico: string;
  enunciado: string;
  alternativas: Readonly<Alternativas>;
  respostaCorreta: RespostaCorreta;
  explicacao: string;
  fundamentacaoLegal: string;
  dificuldade: Dificuldade;
  anoProva?: number;
  tags: readonly string[];
  hashConteudo: string;
}>;

export type MapaGabarito = Map<number, LetraAlternativa>;

export type MotivoRejeicao = 'ENUNCIADO_INVALIDO' | 'ALTERNATIVAS_INVALIDAS' | 'RESPOSTA_INVALIDA';

export type ResultadoNormalizacao =
  | { aceito: true; registro: RegistroQuestao }
  | { aceito: false; motivo: MotivoRejeicao; detalhe: string };

/**
 * Fonte de questoes (um documento). `lerPaginas` e o colaborador externo de
 * extracao de texto: pode falhar, e essa falha fica isolada na fonte.
 */
export interface FonteQuestoes {
  id: string;
  lerPaginas(): PaginaBruta[] | Promise<PaginaBruta[]>;
}

/**
 * Conjunto de questoes ja extraidas anteriormente (JSON com nomes de campo
 * heterogeneos). `lerEntradas` devolve o conteudo bruto, validado depois.
 */
export interface FonteLegada {
  id: string;
  lerEntradas(): unknown;
}

export type FonteImportacao = FonteQuestoes | FonteLegada;

export function ehFonteLegada(fonte: FonteImportacao): fonte is FonteLegada {
  return 'lerEntradas' in fonte;
}

export type EtapaImportacao = 'leitura' | 'preparo' | 'deduplicacao' | 'legado' | 'persistencia';

export type RegistroEtapa = {
  etapa: EtapaImportacao;
  fonteId?: string;
  duracaoMs: number;
  exito: boolean;
};

export type ResumoFonte = {
  candidatos: number;
  rejeitados: number;
  duplicatas: number;
  admitidos: number;
  entradasGabarito: number;
  pendentesRevisao: number;
  falha?: string;
};

export type RelatorioImportacao = {
  fontesProcessadas: number;
  fontesComFalha: number;
  candidatosEncontrados: number;
  registrosRejeitados: number;
  duplicatasDescartadas: number;
  registrosAdmitidos: number;
  candidatosPorFonte: Record<string, number>;
  detalhesPorFonte: Record<string, ResumoFonte>;
  rejeicoesPorMotivo: Record<MotivoRejeicao, number>;
  fontesSemQuestoes: string[];
  fontesSemGabarito: string[];
  registrosPendentesRevisao: number;
  gabaritosIncompativeis: number;
  duplicatasComRespostaDivergente: number;
  duracaoMs: number;
};

export type ResultadoImportacao = {
  registros: RegistroQuestao[];
  relatorio: RelatorioImportacao;
  etapas: RegistroEtapa[];
};
