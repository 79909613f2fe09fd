/**
 * Deduplicacao por impressao digital do enunciado.
 *
 * A primeira ocorrencia de um enunciado vence; as seguintes so incrementam
 * contadores. Duplicatas cuja resposta difere da admitida sao contadas a parte.
 */
import { createHash } from 'node:crypto';
import { normalizarEspacos } from '../../../compartilhado/utilidades/texto';
import type { RegistroQuestao } from '../tipos';

export type ResultadoAdmissao = 'admitido' | 'duplicado';

export function calcularImpressaoDigital(enunciado: string): string {
  return createHash('sha256').update(normalizarEspacos(enunciado).toLowerCase(), 'utf8').digest('hex');
}

export class Deduplicador {
  private readonly porHash = new Map<string, RegistroQuestao>();
  private duplicatas = 0;
  private divergentes = 0;

  admitir(registro: RegistroQuestao): ResultadoAdmissao {
    const existente = this.porHash.get(registro.hashConteudo);
    if (existente) {
      this.duplicatas += 1;
      if (existente.respostaCorreta !== registro.respostaCorreta) this.divergentes += 1;
      return 'duplicado';
    }
    this.porHash.set(registro.hashConteudo, registro);
    return 'admitido';
  }

  /** Registros admitidos, na ordem de admissao. */
  registros(): RegistroQuestao[] {
    return [...this.porHash.values()];
  }

  get totalAdmitidos(): number {
    return this.porHash.size;
  }

  get totalDuplicatas(): number {
    return this.duplicatas;
  }

  get duplicatasComRespostaDivergente(): number {
    return this.divergentes;
  }
}
