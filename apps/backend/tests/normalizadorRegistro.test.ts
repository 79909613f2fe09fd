/**
 * normalizadorRegistro.test
 *
 * Portao de validacao, aliases de campos e valores padrao.
 */
import { describe, expect, it } from 'vitest';
import { criarConfiguracaoExtracao } from '../src/modulos/modulo_importacao_questoes/configuracaoExtracao';
import { calcularImpressaoDigital } from '../src/modulos/modulo_importacao_questoes/deduplicacao/deduplicador';
import {
  candidatoParaEntrada,
  normalizarRegistro
} from '../src/modulos/modulo_importacao_questoes/registro/normalizadorRegistro';
import { segmentarQuestoes } from '../src/modulos/modulo_importacao_questoes/segmentacao/segmentadorQuestoes';

const contexto = { fonteId: 'legado', numeroPadrao: 7 };
const quatro = { A: 'um', B: 'dois', C: 'tres', D: 'quatro' };

describe('normalizador de registros', () => {
  it('aceita nomes de campo alternativos e aplica os padroes', () => {
    const resultado = normalizarRegistro(
      {
        statement: 'Qual é o prazo   prescricional aplicável?',
        options: ['um ano', 'dois anos', 'três anos', 'cinco anos'],
        correctAnswer: 'c',
        difficulty: 'Hard',
        examYear: '2019',
        tags: ['prazo', 'prazo', ' civil ']
      },
      contexto
    );

    expect(resultado.aceito).toBe(true);
    if (!resultado.aceito) return;
    expect(resultado.registro).toEqual({
      fonteId: 'legado',
      numero: 7,
      disciplina: 'Não classificada',
      topico: 'Geral',
      enunciado: 'Qual é o prazo prescricional aplicável?',
      alternativas: { A: 'um ano', B: 'dois anos', C: 'três anos', D: 'cinco anos' },
      respostaCorreta: 'C',
      explicacao: '',
      fundamentacaoLegal: '',
      dificuldade: 'dificil',
      anoProva: 2019,
      tags: ['prazo', 'civil'],
      hashConteudo: calcularImpressaoDigital('QUAL é o prazo prescricional aplicável?')
    });
    expect(Object.isFrozen(resultado.registro)).toBe(true);
  });

  it('aceita colunas legadas alternativa_a..e', () => {
    const resultado = normalizarRegistro(
      {
        pergunta: 'Enunciado legado com texto suficiente',
        alternativa_a: 'a1',
        alternativa_b: 'b1',
        alternativa_c: 'c1',
        alternativa_d: 'd1',
        resposta_correta: 'D',
        disciplina: 'Direito Civil',
        numero_original: 12
      },
      contexto
    );
    expect(resultado).toMatchObject({
      aceito: true,
      registro: { disciplina: 'Direito Civil', respostaCorreta: 'D', numero: 12 }
    });
  });

  it('marca para revisao quando nao ha resposta', () => {
    const resultado = normalizarRegistro({ enunciado: 'Enunciado sem resposta informada', alternativas: quatro }, contexto);
    expect(resultado).toMatchObject({ aceito: true, registro: { respostaCorreta: 'REVISAR' } });
  });

  it('infere a disciplina pelas palavras-chave', () => {
    const resultado = normalizarRegistro(
      { enunciado: 'Segundo a Constituição Federal, compete à União legislar sobre:', alternativas: quatro },
      contexto
    );
    expect(resultado).toMatchObject({ aceito: true, registro: { disciplina: 'Direito Constitucional' } });
  });

  it('rejeita enunciado curto antes de olhar as alternativas', () => {
    const resultado = normalizarRegistro({ enunciado: 'Curto', alternativas: { A: 'so uma' } }, contexto);
    expect(resultado).toMatchObject({ aceito: false, motivo: 'ENUNCIADO_INVALIDO' });
  });

  it('rejeita alternativas insuficientes, vazias ou com letra invalida', () => {
    const enunciado = 'Enunciado valido e longo o suficiente';
    expect(normalizarRegistro({ enunciado, alternativas: { A: 'a', B: 'b', C: 'c' } }, contexto)).toMatchObject({
      aceito: false,
      motivo: 'ALTERNATIVAS_INVALIDAS'
    });
    expect(normalizarRegistro({ enunciado, alternativas: { ...quatro, F: 'f' } }, contexto)).toMatchObject({
      aceito: false,
      motivo: 'ALTERNATIVAS_INVALIDAS'
    });
    expect(normalizarRegistro({ enunciado, alternativas: { ...quatro, B: '   ' } }, contexto)).toMatchObject({
      aceito: false,
      motivo: 'ALTERNATIVAS_INVALIDAS'
    });
  });

  it('rejeita resposta fora das alternativas', () => {
    const resultado = normalizarRegistro(
      { enunciado: 'Enunciado valido e longo o suficiente', alternativas: quatro, gabarito: 'E' },
      contexto
    );
    expect(resultado).toMatchObject({ aceito: false, motivo: 'RESPOSTA_INVALIDA' });
  });

  it('remove a referencia da prova do enunciado e guarda o ano', () => {
    const entrada = candidatoParaEntrada(
      {
        linhasEnunciado: ['(OAB/Exame XXXV - 2022) Sobre o tema,', 'assinale a alternativa correta.'],
        alternativas: quatro,
        respostaCorreta: 'REVISAR'
      },
      3
    );
    expect(entrada).toEqual({
      numero: 3,
      enunciado: 'Sobre o tema, assinale a alternativa correta.',
      alternativas: quatro,
      respostaCorreta: 'REVISAR',
      anoProva: 2022
    });
  });

  it('admite sem alteracoes a questao segmentada com gabarito na linha', () => {
    const [candidato] = [
      ...segmentarQuestoes(
        ['1. What is the capital?', '(A) Paris', '(B) London', '(C) Rome', '(D) Berlin', 'Gabarito: A'],
        criarConfiguracaoExtracao()
      )
    ];
    if (!candidato) throw new Error('candidato nao segmentado');

    const resultado = normalizarRegistro(candidatoParaEntrada(candidato, 1), { fonteId: 'prova', numeroPadrao: 1 });

    expect(resultado).toEqual({
      aceito: true,
      registro: {
        fonteId: 'prova',
        numero: 1,
        disciplina: 'Não classificada',
        topico: 'Geral',
        enunciado: 'What is the capital?',
        alternativas: { A: 'Paris', B: 'London', C: 'Rome', D: 'Berlin' },
        respostaCorreta: 'A',
        explicacao: '',
        fundamentacaoLegal: '',
        dificuldade: 'medio',
        tags: [],
        hashConteudo: calcularImpressaoDigital('What is the capital?')
      }
    });
  });
});
