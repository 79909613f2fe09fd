/**
 * segmentadorQuestoes.test
 *
 * Maquina de estados que separa enunciado, alternativas e gabarito.
 */
import { describe, expect, it } from 'vitest';
import { criarConfiguracaoExtracao } from '../src/modulos/modulo_importacao_questoes/configuracaoExtracao';
import { segmentarQuestoes } from '../src/modulos/modulo_importacao_questoes/segmentacao/segmentadorQuestoes';

const config = criarConfiguracaoExtracao();

function segmentar(linhas: string[]) {
  return [...segmentarQuestoes(linhas, config)];
}

describe('segmentador de questoes', () => {
  it('extrai enunciado numerado, alternativas e letra do gabarito', () => {
    const candidatos = segmentar([
      '1. What is the capital?',
      '(A) Paris',
      '(B) London',
      '(C) Rome',
      '(D) Berlin',
      'Gabarito: A'
    ]);

    expect(candidatos).toEqual([
      {
        numero: 1,
        linhasEnunciado: ['What is the capital?'],
        alternativas: { A: 'Paris', B: 'London', C: 'Rome', D: 'Berlin' },
        respostaCorreta: 'A'
      }
    ]);
    expect(candidatos[0]?.linhasEnunciado.join(' ')).toHaveLength(20);
  });

  it('fecha a questao anterior quando uma nova alternativa A aparece sem gabarito', () => {
    const candidatos = segmentar([
      '1. Considere o seguinte caso hipotético:',
      '(A) primeira',
      '(B) segunda',
      '(C) terceira',
      '(D) quarta',
      '(A) outra primeira',
      '(B) outra segunda',
      '(C) outra terceira',
      '(D) outra quarta',
      '(E) outra quinta'
    ]);

    expect(candidatos).toHaveLength(2);
    expect(candidatos[0]).toMatchObject({ numero: 1, respostaCorreta: 'REVISAR' });
    expect(candidatos[1]?.numero).toBeUndefined();
    expect(candidatos[1]?.linhasEnunciado).toEqual([]);
    expect(Object.keys(candidatos[1]?.alternativas ?? {})).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('anexa continuacao a ultima alternativa e ignora comentarios', () => {
    const [candidato] = segmentar([
      '2. Sobre a responsabilidade civil, assinale a correta.',
      'A) texto da alternativa A',
      'que continua aqui',
      'B) segunda',
      'C) terceira',
      'D) quarta',
      'Comentários: a alternativa correta trata do dano moral.',
      'Gabarito: B'
    ]);

    expect(candidato?.alternativas).toEqual({
      A: 'texto da alternativa A que continua aqui',
      B: 'segunda',
      C: 'terceira',
      D: 'quarta'
    });
    expect(candidato?.respostaCorreta).toBe('B');
  });

  it('le o gabarito espelhado do texto extraido', () => {
    const [candidato] = segmentar([
      '3. Enunciado com gabarito invertido pelo extrator.',
      'a) um',
      'b) dois',
      'c) tres',
      'd) quatro',
      '"C" otirabaG'
    ]);
    expect(candidato?.respostaCorreta).toBe('C');
  });

  it('mantem no enunciado itens numerados menores que o numero da questao', () => {
    const [candidato] = segmentar([
      '5. Enunciado de cinco com texto suficiente',
      '2. item citado dentro do enunciado',
      '(A) um',
      '(B) dois',
      '(C) tres',
      '(D) quatro'
    ]);
    expect(candidato?.numero).toBe(5);
    expect(candidato?.linhasEnunciado).toEqual([
      'Enunciado de cinco com texto suficiente',
      '2. item citado dentro do enunciado'
    ]);
  });

  it('mantem no enunciado itens numerados maiores que o numero da questao', () => {
    const candidatos = segmentar([
      '1. Considere as afirmacoes sobre locacao de imoveis:',
      '2) o locador pode retomar o imovel a qualquer tempo',
      '(A) um',
      '(B) dois',
      '(C) tres',
      '(D) quatro',
      '2. Segunda questao da prova sobre outro tema',
      '(A) um',
      '(B) dois',
      '(C) tres',
      '(D) quatro'
    ]);

    expect(candidatos.map((candidato) => [candidato.numero, candidato.linhasEnunciado])).toEqual([
      [1, ['Considere as afirmacoes sobre locacao de imoveis:', '2) o locador pode retomar o imovel a qualquer tempo']],
      [2, ['Segunda questao da prova sobre outro tema']]
    ]);
  });

  it('nao trata linhas de enunciado que citam resposta ou gabarito como marcador', () => {
    const [candidato] = segmentar([
      '1. Sobre o recurso cabivel no caso narrado.',
      'Resposta do reu apresentada fora do prazo legal.',
      'Conforme o gabarito: preliminar divulgado pela banca',
      '(A) um',
      '(B) dois',
      '(C) tres',
      '(D) quatro',
      'Resposta correta: letra D'
    ]);

    expect(candidato?.linhasEnunciado).toEqual([
      'Sobre o recurso cabivel no caso narrado.',
      'Resposta do reu apresentada fora do prazo legal.',
      'Conforme o gabarito: preliminar divulgado pela banca'
    ]);
    expect(candidato?.respostaCorreta).toBe('D');
  });

  it('descarta candidatos com menos de quatro alternativas', () => {
    expect(segmentar(['3. Questão incompleta com poucas alternativas', '(A) x', '(B) y', '(C) z'])).toEqual([]);
  });

  it('nao emite nada sem marcadores reconheciveis', () => {
    expect(segmentar([])).toEqual([]);
    expect(segmentar(['texto corrido sem nenhuma marcação de questão', 'outra linha qualquer de texto'])).toEqual([]);
  });

  it('ignora linhas curtas fora de enunciado numerado', () => {
    const [candidato] = segmentar([
      'Pergunta',
      'Enunciado sem numero mas longo o bastante',
      '(A) um',
      '(B) dois',
      '(C) tres',
      '(D) quatro'
    ]);
    expect(candidato?.linhasEnunciado).toEqual(['Enunciado sem numero mas longo o bastante']);
    expect(candidato?.numero).toBeUndefined();
  });
});
