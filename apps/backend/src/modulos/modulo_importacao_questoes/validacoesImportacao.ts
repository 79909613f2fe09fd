/**
 * Validacoes do endpoint de importacao.
 */
import { z } from 'zod';

const esquemaPagina = z
  .object({
    indice: z.number().int().min(0),
    texto: z.string()
  })
  .strict();

const esquemaFonte = z
  .object({
    id: z.string().trim().min(1).max(200),
    paginas: z.array(esquemaPagina).max(2_000)
  })
  .strict();

export const esquemaImportacao = z
  .object({
    fontes: z.array(esquemaFonte).min(1).max(50),
    persistir: z.boolean().default(false)
  })
  .strict()
  .refine((data) => new Set(data.fontes.map((fonte) => fonte.id)).size === data.fontes.length, {
    message: 'Ids de fonte devem ser unicos'
  });

export type CorpoImportacao = z.infer<typeof esquemaImportacao>;
