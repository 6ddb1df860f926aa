import React from 'react';
import { ChevronDown } from 'lucide-react';

interface SubPanelProps {
  title: string;
  icon?: React.ReactNode;
  headerRight?: React.ReactNode;
  children: React.ReactNode;
  className?: string;
  bodyClassName?: string;
  defaultCollapsed?: boolean;
}

export const cx = (...classes: Array<string | false | null | undefined>): string =>
  classes.filter(Boolean).join(' ');

export const SubPanel: React.FC<SubPanelProps> = ({
  title,
  icon,
  headerRight,
  children,
  className = '',
  bodyClassName = '',
  defaultCollapsed = false,
}) => {
  const [collapsed, setCollapsed] = React.useState(defaultCollapsed);

  return (
    <section className={cx('flex flex-col bg-neutral-900', className)}>
      <header
        className="p-2 border-b border-neutral-800 cursor-pointer select-none hover:bg-neutral-800/60 transition-colors"
        onClick={() => setCollapsed((value) => !value)}
      >
        <div className="flex items-center justify-between gap-3">
          <h2 className="text-xs font-bold uppercase tracking-wider text-neutral-500 flex items-center">
            <ChevronDown
              className={cx('w-3 h-3 mr-1.5 text-neutral-600 transition-transform duration-200', collapsed && '-rotate-90')}
            />
            {icon && <span className="mr-2 inline-flex">{icon}</span>}
            {title}
          </h2>
          {headerRight}
        </div>
      </header>
      {!collapsed && <div className={bodyClassName}>{children}</div>}
    </section>
  );
};
