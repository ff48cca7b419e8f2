import { nanoid } from 'nanoid'
import type { Notice, NoticeLevel } from '../types'

export const createNotice = (level: NoticeLevel, text: string): Notice => ({ id: nanoid(), level, text })

// Mirrors every notice shown in the UI onto the console.
export const logNotice = (notice: Notice): void => {
  /* eslint-disable no-console */
  if (notice.level === 'error') console.error(notice.text)
  else if (notice.level === 'warning') console.warn(notice.text)
  else console.info(notice.text)
  /* eslint-enable no-console */
}
