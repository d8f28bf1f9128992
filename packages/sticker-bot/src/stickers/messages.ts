export const WELCOME_TEXT =
  "Привет! Это бот для моего мини-проекта, который помогает собирать информацию о стикерпаках!\n\n" +
  "Пожалуйста, пришли мне по одному стикеру из каждого добавленного стикерпака, это займёт всего несколько минут! \n\n" +
  "Данное действие очень сильно мне поможет, спасибо за помощь! 🙏🙏🙏\n\n" +
  "Вот видео пример того, как это делается:";

export const NOT_IN_PACK_TEXT =
  "⚠️ Этот стикер не принадлежит ни одному стикерпаку.";

export const THANK_YOU_TEXT =
  "Спасибо! Пришли мне ещё стикеры из других стикерпаков, пожалуйста 🙏";

export const TRY_AGAIN_LATER_TEXT =
  "❌ Произошла ошибка при обработке стикера. Пожалуйста, вернитесь позже и попробуйте снова 🙏🙏🙏";

export const INSTRUCTION_VIDEO_CAPTION = "📖 Инструкция по использованию бота";

export const VIDEO_MISSING_TEXT =
  "⚠️ Видео с инструкцией пока не добавлено.\n" +
  "Но бот работает - просто отправь стикер!";

export const VIDEO_UNAVAILABLE_TEXT =
  "⚠️ Видео с инструкцией временно недоступно.";
