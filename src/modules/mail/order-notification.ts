import { NewOrder } from '../orders/entities/order.entity';
import { AdminMessage } from './mail.service';
import { escapeHtml } from '../../common/utils/escape-html';

export const ORDER_NOTIFICATION_SUBJECT = 'Получен новый запрос на автозапчасти';

export function buildOrderNotification(order: NewOrder): AdminMessage {
  const vinLine = order.vin
    ? `<p><strong>VIN:</strong> ${escapeHtml(order.vin)}</p>`
    : '<p><strong>VIN:</strong> Не был предоставлен пользователем.</p>';
  const username = order.telegramUsername ? `@${escapeHtml(order.telegramUsername)}` : 'Не указано';

  const html =
    `<h2>${ORDER_NOTIFICATION_SUBJECT}</h2><hr>` +
    vinLine +
    `<p><strong>ID пользователя Telegram:</strong> ${order.telegramUserId}</p>` +
    `<p><strong>Имя пользователя Telegram:</strong> ${username}</p>` +
    `<p><strong>Предоставленные контакты:</strong> ${escapeHtml(order.contactInfo)}</p><hr>` +
    '<p><strong>Необходимые запчасти:</strong></p>' +
    '<blockquote style="border-left: 4px solid #ccc; padding-left: 10px; margin-left: 0; font-style: italic;">' +
    `${escapeHtml(order.partsNeeded)}</blockquote><hr>` +
    '<p>Пожалуйста, свяжитесь с пользователем.</p>';

  return { subject: ORDER_NOTIFICATION_SUBJECT, html };
}
