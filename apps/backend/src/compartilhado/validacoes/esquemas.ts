// Esquemas Zod reutilizaveis (contratos HTTP).
import { z } from 'zod';

// Inteiros vindos da query string chegam como texto.
export const esquemaInteiroConsulta = (porPadrao: number, { min, max }: { min: number; max: number }) =>
  z.coerce.number().int().min(min).max(max).default(porPadrao);
