/**
 * Configuracao do pipeline de extracao.
 *
 * Os varios extratores "quase iguais" viram um unico segmentador
 * parametrizado por um conjunto ordenado de padroes. Ajustar um formato novo
 * de caderno de prova = passar outro `PadroesSegmentacao`, nao escrever outro
 * extrator.
 */
import { z } from 'zod';
import { configuracao } from '../../configuracao';
import { ErroPipelineFatal } from './errosImportacao';
import type { LetraAlternativa } from './tipos';

export type FormatoAlternativa = (letra: LetraAlternativa) => RegExp;

export type PadroesSegmentacao = {
  /** Cada formato recebe a letra e devolve um regex cujo grupo 1 e o texto. */
  formatosAlternativa: FormatoAlternativa[];
  /** Grupo 1 = numero da questao, grupo 2 (opcional) = resto do enunciado. */
  enunciadoNumerado: RegExp[];
  marcadorGabarito: RegExp;
  /** Grupo 1 = letra capturada na linha do marcador. */
  letraGabarito: RegExp[];
  /** Linhas de comentario/explicacao que nunca entram numa alternativa. */
  comentario: RegExp[];
};

export type ConfiguracaoExtracao = {
  tamanhoMinimoLinhaEnunciado: number;
  maximoQuestoes: number;
  janelaGabarito: number;
  minimoColunasTabela: number;
  limiteMaiusculas: number;
  padroesRuido: RegExp[];
  palavraChaveGabarito: RegExp;
  padroes: PadroesSegmentacao;
};

export type ConfiguracaoExtracaoParcial = Partial<Omit<ConfiguracaoExtracao, 'padroes'>> & {
  padroes?: Partial<PadroesSegmentacao>;
};

export const PADROES_PADRAO: PadroesSegmentacao = {
  formatosAlternativa: [
    (letra) => new RegExp(`^\\(${letra}\\)\\s*(.*)$`),
    (letra) => new RegExp(`^${letra}\\)\\s*(.*)$`),
    (letra) => new RegExp(`^${letra.toLowerCase()}\\)\\s*(.*)$`),
    (letra) => new RegExp(`^${letra}\\s*[.\\-–]\\s+(.*)$`)
  ],
  enunciadoNumerado: [
    /^quest[aã]o\s+(\d{1,4})\b\s*[.:)\-–]?\s*(.*)$/i,
    /^(\d{1,4})\s*[.)\-–:](?:\s+(.*))?$/
  ],
  // "Resposta" so marca gabarito quando seguida apenas da letra.
  marcadorGabarito:
    /^gabarito\b|^resposta(?:\s+correta)?(?:\s+oficial)?\s*[:\-–]?\s*(?:letra|alternativa)?\s*["“”'(]?[A-E]["“”')]?\s*[.;]?\s*$|otirabag/i,
  letraGabarito: [
    /["“”']([A-E])["“”']?\s+otirabaG/i,
    /(?:gabarito|resposta(?:\s+correta)?)(?:\s+oficial)?\s*[:\-–]?\s*(?:letra|alternativa)?\s*["“”'(]?([A-E])["“”')]?\s*[.;]?\s*$/i
  ],
  comentario: [
    /^(?:nos termos|como visto|perceba|destaque-se|vamos|trata-se)\b/i,
    /^a alternativa\b/i,
    /^[A-E]\s*:\s*(?:in)?corret[ao]\b/i,
    /^coment[aá]rios?\b/i
  ]
};

export const RUIDO_PADRAO: RegExp[] = [
  /^\d+$/,
  /^\d+\s*\/\s*\d+$/,
  /^p[aá]g(?:ina|\.)\s*\d+/i,
  /^www\./i,
  /^como passar na oab/i
];

// `test`/`exec` com as flags g ou y guardam `lastIndex` entre linhas.
const esquemaRegex = z
  .instanceof(RegExp)
  .refine((padrao) => !padrao.global && !padrao.sticky, { message: 'Padroes nao podem usar as flags g ou y' });

const esquemaFormatoAlternativa = z
  .custom<FormatoAlternativa>((valor) => typeof valor === 'function', { message: 'Formato de alternativa deve ser funcao' })
  .refine((formato) => formato('A') instanceof RegExp, { message: 'Formato de alternativa deve devolver RegExp' });

const esquemaConfiguracao = z.object({
  tamanhoMinimoLinhaEnunciado: z.number().int().min(1),
  maximoQuestoes: z.number().int().min(1),
  janelaGabarito: z.number().int().min(1),
  minimoColunasTabela: z.number().int().min(2),
  limiteMaiusculas: z.number().int().min(1),
  padroesRuido: z.array(esquemaRegex),
  palavraChaveGabarito: esquemaRegex,
  padroes: z.object({
    formatosAlternativa: z.array(esquemaFormatoAlternativa).min(1),
    enunciadoNumerado: z.array(esquemaRegex),
    marcadorGabarito: esquemaRegex,
    letraGabarito: z.array(esquemaRegex),
    comentario: z.array(esquemaRegex)
  })
});

function configuracaoBase(): ConfiguracaoExtracao {
  return {
    tamanhoMinimoLinhaEnunciado: configuracao.importacao.tamanhoMinimoLinhaEnunciado,
    maximoQuestoes: configuracao.importacao.maximoQuestoes,
    janelaGabarito: configuracao.importacao.janelaGabarito,
    minimoColunasTabela: 3,
    limiteMaiusculas: configuracao.importacao.limiteMaiusculas,
    padroesRuido: RUIDO_PADRAO,
    palavraChaveGabarito: /gabarito|respostas?\s+corretas?|otirabag/i,
    padroes: PADROES_PADRAO
  };
}

/**
 * Mescla ajustes sobre a configuracao do ambiente e valida o resultado.
 * Configuracao malformada e `ErroPipelineFatal`: nao ha como seguir.
 */
export function criarConfiguracaoExtracao(parcial: ConfiguracaoExtracaoParcial = {}): ConfiguracaoExtracao {
  const base = configuracaoBase();
  const candidata = {
    ...base,
    ...parcial,
    padroes: { ...base.padroes, ...(parcial.padroes ?? {}) }
  };

  const resultado = esquemaConfiguracao.safeParse(candidata);
  if (!resultado.success) {
    throw new ErroPipelineFatal('Configuracao de extracao invalida', resultado.error.flatten());
  }
  return candidata;
}
