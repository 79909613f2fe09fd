/**
 * Exporta o banco consolidado de uma execucao para JSON.
 */
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { RegistroQuestao, RelatorioImportacao } from '../tipos';

export type ArquivoConsolidado = {
  metadata: {
    totalQuestoes: number;
    geradoEm: string;
    fontesProcessadas: number;
    fontesComFalha: number;
    registrosRejeitados: number;
    duplicatasDescartadas: number;
    registrosPendentesRevisao: number;
  };
  questoesPorFonte: Record<string, number>;
  questoes: RegistroQuestao[];
};

export function montarConsolidado(
  registros: readonly RegistroQuestao[],
  relatorio: RelatorioImportacao,
  agora: Date = new Date()
): ArquivoConsolidado {
  const questoesPorFonte: Record<string, number> = {};
  for (const registro of registros) {
    questoesPorFonte[registro.fonteId] = (questoesPorFonte[registro.fonteId] ?? 0) + 1;
  }
  return {
    metadata: {
      totalQuestoes: registros.length,
      geradoEm: agora.toISOString(),
      fontesProcessadas: relatorio.fontesProcessadas,
      fontesComFalha: relatorio.fontesComFalha,
      registrosRejeitados: relatorio.registrosRejeitados,
      duplicatasDescartadas: relatorio.duplicatasDescartadas,
      registrosPendentesRevisao: relatorio.registrosPendentesRevisao
    },
    questoesPorFonte,
    questoes: [...registros]
  };
}

export async function exportarConsolidado(
  registros: readonly RegistroQuestao[],
  relatorio: RelatorioImportacao,
  caminho: string
): Promise<ArquivoConsolidado> {
  const consolidado = montarConsolidado(registros, relatorio);
  await fs.mkdir(path.dirname(caminho), { recursive: true });
  await fs.writeFile(caminho, `${JSON.stringify(consolidado, null, 2)}\n`, 'utf8');
  return consolidado;
}
