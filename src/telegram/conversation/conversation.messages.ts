import { ReplyButton } from './conversation.types';

// Callback tags are part of the wire contract with already-sent messages
export const BUTTON_TAGS = {
  VIN_YES: 'vin_yes',
  VIN_NO: 'vin_no',
  NEW_REQUEST: 'new_request',
} as const;

export const COMMANDS = {
  START: 'start',
  CANCEL: 'cancel',
} as const;

export const KEEP_ALIVE_TEXT = 'ping';

export const VIN_CHOICE_BUTTONS: ReplyButton[][] = [
  [{ text: '✅ Да, я знаю свой VIN', tag: BUTTON_TAGS.VIN_YES }],
  [{ text: '❌ Нет, я не знаю свой VIN', tag: BUTTON_TAGS.VIN_NO }],
];

export const NEW_REQUEST_BUTTONS: ReplyButton[][] = [
  [{ text: '➕ Запросить снова', tag: BUTTON_TAGS.NEW_REQUEST }],
];

export const MESSAGES = {
  welcome: (mention: string) =>
    `👋 Добро пожаловать, ${mention}!\n\n` +
    'Я помогу вам запросить автозапчасти. Для начала, пожалуйста, скажите:',
  welcomeBack: (mention: string) =>
    `👋 Снова здравствуйте, ${mention}!\n\n` +
    'Готов принять новый запрос на автозапчасти. Для начала:',
  askVinKnown: 'Знаете ли вы VIN (идентификационный номер) вашего автомобиля?',
  askVin: 'Отлично! Пожалуйста, введите ваш 17-значный VIN.',
  askContactWithoutVin:
    'Нет проблем. Пожалуйста, укажите ваш номер телефона или адрес электронной почты, чтобы мы могли с вами связаться.',
  invalidVin: 'Это не похоже на действительный 17-значный VIN.\nПожалуйста, попробуйте еще раз или введите /cancel для отмены.',
  askContactAfterVin: 'Спасибо! Теперь, пожалуйста, укажите ваш номер телефона или адрес электронной почты для связи.',
  invalidContact:
    'Пожалуйста, введите действительный номер телефона или адрес электронной почты (минимум 5 символов).\n' +
    'Или введите /cancel для отмены.',
  askParts: 'Понял! Теперь, пожалуйста, опишите необходимые вам автозапчасти или детали.',
  emptyParts: 'Пожалуйста, опишите необходимые детали или введите /cancel для отмены.',
  orderSaved: '✅ Спасибо! Ваш запрос отправлен.\nМы получили ваши данные и список деталей. Мы скоро свяжемся с вами!',
  orderFailed: '❌ Извините, произошла ошибка при сохранении вашего запроса. Пожалуйста, попробуйте позже.',
  missingData: 'Извините, произошла ошибка при получении ваших данных. Пожалуйста, начните сначала с /start.',
  unknownChoice: 'Произошла ошибка. Пожалуйста, попробуйте начать сначала с /start.',
  pickAnOption: 'Пожалуйста, выберите один из вариантов ниже.',
  cancelled: 'Хорошо, процесс запроса отменен.',
  unexpectedCommand: (command: string) =>
    `Команда ${command} здесь не ожидается. Пожалуйста, следуйте инструкциям или используйте /cancel для отмены.`,
  unexpectedInput:
    'Извините, я этого не ожидал. Если вы были в процессе запроса, пожалуйста, следуйте подсказкам. ' +
    'Вы всегда можете начать сначала с /start или отменить с /cancel.',
  noActiveRequest: 'Чтобы оформить запрос на автозапчасти, отправьте /start.',
  sessionExpired: 'Этот запрос уже завершён. Чтобы начать новый, отправьте /start.',
  internalError: 'Извините, произошла внутренняя ошибка. Пожалуйста, начните сначала с /start.',
} as const;
