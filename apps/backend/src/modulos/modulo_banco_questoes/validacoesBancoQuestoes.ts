/**
 * Validacoes do banco de questoes.
 */
import { z } from 'zod';
import { esquemaInteiroConsulta } from '../../compartilhado/validacoes/esquemas';
import { DIFICULDADES, LETRAS_ALTERNATIVAS, SENTINELA_REVISAO } from '../modulo_importacao_questoes/tipos';

export const esquemaListarQuestoes = z
  .object({
    pagina: esquemaInteiroConsulta(1, { min: 1, max: 100_000 }),
    porPagina: esquemaInteiroConsulta(10, { min: 1, max: 100 }),
    disciplina: z.string().trim().min(1).max(120).optional(),
    dificuldade: z.enum(DIFICULDADES).optional(),
    respostaCorreta: z.enum([...LETRAS_ALTERNATIVAS, SENTINELA_REVISAO]).optional(),
    fonteId: z.string().trim().min(1).max(200).optional()
  })
  .strict();

export type ConsultaListarQuestoes = z.infer<typeof esquemaListarQuestoes>;
