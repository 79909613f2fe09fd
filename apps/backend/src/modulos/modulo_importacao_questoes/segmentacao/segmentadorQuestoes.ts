/**
 * Segmentador de questoes: maquina de estados sobre linhas ja normalizadas.
 *
 * Estados:
 * - PROCURANDO: fora de qualquer questao.
 * - NO_ENUNCIADO: acumulando linhas do enunciado.
 * - NAS_ALTERNATIVAS: acumulando alternativas (A, B, C...) em ordem.
 * - NO_GABARITO: a linha do gabarito ja foi lida; a proxima linha fecha a questao.
 *
 * Candidatos com menos de `MINIMO_ALTERNATIVAS` letras sao descartados no fechamento.
 */
import type { ConfiguracaoExtracao, PadroesSegmentacao } from '../configuracaoExtracao';
import {
  LETRAS_ALTERNATIVAS,
  MINIMO_ALTERNATIVAS,
  SENTINELA_REVISAO,
  ehLetraAlternativa,
  type Alternativas,
  type CandidatoQuestao,
  type LetraAlternativa,
  type RespostaCorreta
} from '../tipos';

type Estado = 'PROCURANDO' | 'NO_ENUNCIADO' | 'NAS_ALTERNATIVAS' | 'NO_GABARITO';

type CandidatoEmConstrucao = {
  numero?: number;
  linhasEnunciado: string[];
  alternativas: Alternativas;
  ultimaLetra?: LetraAlternativa;
  respostaCorreta: RespostaCorreta;
};

type EnunciadoNumerado = { numero: number; resto: string };

class ReconhecedorLinhas {
  private readonly alternativasPorLetra: Map<LetraAlternativa, RegExp[]>;

  constructor(private readonly padroes: PadroesSegmentacao) {
    this.alternativasPorLetra = new Map(
      LETRAS_ALTERNATIVAS.map((letra) => [letra, padroes.formatosAlternativa.map((formato) => formato(letra))])
    );
  }

  alternativa(linha: string, letra: LetraAlternativa): string | null {
    for (const padrao of this.alternativasPorLetra.get(letra) ?? []) {
      const casamento = padrao.exec(linha);
      if (casamento) return (casamento[1] ?? '').trim();
    }
    return null;
  }

  enunciadoNumerado(linha: string): EnunciadoNumerado | null {
    for (const padrao of this.padroes.enunciadoNumerado) {
      const casamento = padrao.exec(linha);
      if (!casamento) continue;
      const numero = Number.parseInt(casamento[1] ?? '', 10);
      if (!Number.isFinite(numero)) continue;
      return { numero, resto: (casamento[2] ?? '').trim() };
    }
    return null;
  }

  marcadorGabarito(linha: string): boolean {
    return this.padroes.marcadorGabarito.test(linha);
  }

  letraGabarito(linha: string): LetraAlternativa | undefined {
    for (const padrao of this.padroes.letraGabarito) {
      const letra = padrao.exec(linha)?.[1]?.toUpperCase();
      if (ehLetraAlternativa(letra)) return letra;
    }
    return undefined;
  }

  comentario(linha: string): boolean {
    return this.padroes.comentario.some((padrao) => padrao.test(linha));
  }
}

function proximaLetra(letra: LetraAlternativa | undefined): LetraAlternativa | undefined {
  if (!letra) return 'A';
  return LETRAS_ALTERNATIVAS[LETRAS_ALTERNATIVAS.indexOf(letra) + 1];
}

function novoCandidato(numero?: number, primeiraLinha?: string): CandidatoEmConstrucao {
  return {
    ...(numero === undefined ? {} : { numero }),
    linhasEnunciado: primeiraLinha ? [primeiraLinha] : [],
    alternativas: {},
    respostaCorreta: SENTINELA_REVISAO
  };
}

function fechar(candidato: CandidatoEmConstrucao | undefined): CandidatoQuestao | undefined {
  if (!candidato) return undefined;
  const letras = Object.keys(candidato.alternativas).length;
  if (letras < MINIMO_ALTERNATIVAS) return undefined;
  return {
    ...(candidato.numero === undefined ? {} : { numero: candidato.numero }),
    linhasEnunciado: [...candidato.linhasEnunciado],
    alternativas: { ...candidato.alternativas },
    respostaCorreta: candidato.respostaCorreta
  };
}

/**
 * Percorre as linhas e emite cada questao assim que ela fecha. Sem nenhum
 * marcador reconhecivel a sequencia sai vazia.
 */
export function* segmentarQuestoes(
  linhas: Iterable<string>,
  config: Pick<ConfiguracaoExtracao, 'padroes' | 'tamanhoMinimoLinhaEnunciado'>
): Generator<CandidatoQuestao, void, undefined> {
  const reconhecer = new ReconhecedorLinhas(config.padroes);
  let estado: Estado = 'PROCURANDO';
  let atual: CandidatoEmConstrucao | undefined;

  for (const linha of linhas) {
    if (!linha) continue;

    if (estado === 'NO_GABARITO') {
      const pronto = fechar(atual);
      if (pronto) yield pronto;
      atual = undefined;
      estado = 'PROCURANDO';
    }

    if (estado === 'NAS_ALTERNATIVAS' && atual) {
      if (reconhecer.marcadorGabarito(linha)) {
        const letra = reconhecer.letraGabarito(linha);
        if (letra) atual.respostaCorreta = letra;
        estado = 'NO_GABARITO';
        continue;
      }

      const textoA = reconhecer.alternativa(linha, 'A');
      if (textoA !== null) {
        // Nova lista de alternativas sem marcador de gabarito: fecha a anterior.
        const pronto = fechar(atual);
        if (pronto) yield pronto;
        atual = novoCandidato();
        atual.alternativas.A = textoA;
        atual.ultimaLetra = 'A';
        continue;
      }

      const esperada = proximaLetra(atual.ultimaLetra);
      const textoProxima = esperada ? reconhecer.alternativa(linha, esperada) : null;
      if (esperada && textoProxima !== null) {
        atual.alternativas[esperada] = textoProxima;
        atual.ultimaLetra = esperada;
        continue;
      }

      const numerado = reconhecer.enunciadoNumerado(linha);
      if (numerado) {
        const pronto = fechar(atual);
        if (pronto) yield pronto;
        atual = novoCandidato(numerado.numero, numerado.resto);
        estado = 'NO_ENUNCIADO';
        continue;
      }

      if (reconhecer.comentario(linha)) continue;

      const ultima = atual.ultimaLetra;
      if (ultima) {
        const anterior = atual.alternativas[ultima] ?? '';
        atual.alternativas[ultima] = anterior ? `${anterior} ${linha}` : linha;
      }
      continue;
    }

    // PROCURANDO ou NO_ENUNCIADO.
    if (reconhecer.marcadorGabarito(linha)) {
      // Gabarito sem alternativas: o enunciado acumulado nao forma questao.
      atual = undefined;
      estado = 'PROCURANDO';
      continue;
    }

    const textoA = reconhecer.alternativa(linha, 'A');
    if (textoA !== null) {
      atual = atual ?? novoCandidato();
      atual.alternativas.A = textoA;
      atual.ultimaLetra = 'A';
      estado = 'NAS_ALTERNATIVAS';
      continue;
    }

    const numerado = reconhecer.enunciadoNumerado(linha);
    if (numerado) {
      // Com enunciado numerado em curso, "2) ..." e item do enunciado, nao questao nova.
      const reinicia = estado === 'PROCURANDO' || !atual || atual.numero === undefined;
      if (reinicia) {
        atual = novoCandidato(numerado.numero, numerado.resto);
        estado = 'NO_ENUNCIADO';
      } else if (atual) {
        atual.linhasEnunciado.push(linha);
      }
      continue;
    }

    if (linha.length < config.tamanhoMinimoLinhaEnunciado) continue;

    if (!atual) atual = novoCandidato();
    atual.linhasEnunciado.push(linha);
    estado = 'NO_ENUNCIADO';
  }

  const pronto = fechar(atual);
  if (pronto) yield pronto;
}
