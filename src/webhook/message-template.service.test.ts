import { createCommentEvent, createTestConfig } from '../test/fixtures';
import { MessageTemplateService } from './message-template.service';

function render(template: string, text = 'please dm'): string {
  const service = new MessageTemplateService(
    createTestConfig({ messageTemplate: template }),
  );
  return service.render(createCommentEvent({ text }));
}

describe('MessageTemplateService', () => {
  test('sends a template without placeholders verbatim', () => {
    expect(render('Thanks! Check your inbox.')).toBe(
      'Thanks! Check your inbox.',
    );
  });

  test('fills in comment variables', () => {
    expect(
      render('Hey @{{username}} ({{userId}}), re {{postId}}/{{commentId}}'),
    ).toBe('Hey @bob (123), re p1/c1');
  });

  test('does not HTML-escape values', () => {
    expect(render('You said: {{commentText}}', 'dm <b>me</b> & co')).toBe(
      'You said: dm <b>me</b> & co',
    );
  });
});
